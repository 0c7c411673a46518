import type { IngestionResult, SourceRecord } from '../types.js';

const STATUS_MARK: Record<IngestionResult['status'], string> = {
  processed: '✅',
  pending: '…',
  failed: '❌',
  unsupported: '⚠️',
  cancelled: '⏹'
};

export function buildIngestionSummary(result: IngestionResult): string {
  const head = `${STATUS_MARK[result.status]} ${result.origin}`;
  const parts = [result.status, result.modality, result.id].filter(Boolean).join(', ');
  return result.error_detail ? `${head} (${parts})\n   ${result.error_detail}` : `${head} (${parts})`;
}

function degradedNote(record: SourceRecord): string | null {
  const meta = record.raw_metadata;
  if (meta.ocrSkipped === true) return 'OCR skipped';
  if (meta.transcriptionSkipped === true) return 'transcription skipped';
  return null;
}

export function describeSource(record: SourceRecord): string {
  const columns = [record.id, record.status.padEnd(9), record.modality.padEnd(13), record.origin];
  const lines = [columns.join('  ')];

  if (record.status === 'failed') {
    lines.push(`    error: ${record.error_detail}`);
  } else if (record.status === 'processed') {
    const preview = record.extracted_text.replace(/\s+/g, ' ').trim().slice(0, 120);
    const note = degradedNote(record);
    lines.push(`    ${record.extracted_text.length} chars${note ? `, ${note}` : ''}${preview ? `: ${preview}${preview.length >= 120 ? '…' : ''}` : ''}`);
  }

  return lines.join('\n');
}

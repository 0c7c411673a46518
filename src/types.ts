export type Modality = 'text-document' | 'image' | 'audio' | 'video' | 'youtube-link';

export const MODALITIES: Modality[] = ['text-document', 'image', 'audio', 'video', 'youtube-link'];

export type SourceStatus = 'pending' | 'processed' | 'failed';

export type RawMetadata = Record<string, unknown>;

interface SourceRecordBase {
  id: string;
  origin: string;
  modality: Modality;
  raw_metadata: RawMetadata;
  created_at: string;
  updated_at: string;
}

export interface PendingSourceRecord extends SourceRecordBase {
  status: 'pending';
  extracted_text: '';
  error_detail?: undefined;
}

export interface ProcessedSourceRecord extends SourceRecordBase {
  status: 'processed';
  extracted_text: string;
  error_detail?: undefined;
}

export interface FailedSourceRecord extends SourceRecordBase {
  status: 'failed';
  extracted_text: '';
  error_detail: string;
}

export type SourceRecord = PendingSourceRecord | ProcessedSourceRecord | FailedSourceRecord;

export interface ChunkRecord {
  source_id: string;
  chunk_index: number;
  text: string;
  token_count: number;
  embedding: number[] | null;
  embedding_model: string | null;
}

export interface ContextEntry {
  source_id: string;
  origin: string;
  modality: Modality;
  excerpt: string;
  score: number;
}

export type ContextBundle = ContextEntry[];

export interface ImageReference {
  source_id: string;
  origin: string;
  path: string;
}

export type IngestStatus = SourceStatus | 'unsupported' | 'cancelled';

export interface IngestionResult {
  id: string | null;
  origin: string;
  modality: Modality | null;
  status: IngestStatus;
  error_detail?: string;
}

export type QueryStatus = 'answered' | 'no_context' | 'failed';

export interface QueryAnswer {
  answer: string;
  sourceIds: string[];
  status: Exclude<QueryStatus, 'failed'>;
}

export interface QueryHistoryEntry {
  id: number;
  question: string;
  answer: string | null;
  source_ids: string[];
  status: QueryStatus;
  created_at: string;
}

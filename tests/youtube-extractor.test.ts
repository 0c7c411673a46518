import { writeFileSync } from 'node:fs';
import { YoutubeTranscript } from 'youtube-transcript';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ExtractionError } from '../src/errors.js';
import { youtubeExtractor } from '../src/ingest/extractors/youtube.js';
import { runCommand } from '../src/utils/command.js';
import { canonicalYoutubeUrl, isYouTubeUrl, youtubeVideoId } from '../src/utils/youtube.js';
import { fakeRunner, testConfig } from './helpers.js';

vi.mock('youtube-transcript', () => ({
  YoutubeTranscript: { fetchTranscript: vi.fn() }
}));

const fetchTranscript = vi.mocked(YoutubeTranscript.fetchTranscript);
const URL_ = 'https://www.youtube.com/watch?v=abcdefghijk';
const input = { origin: 'https://youtu.be/abcdefghijk', location: URL_, extension: '' };

describe('youtube urls', () => {
  it.each([
    ['https://www.youtube.com/watch?v=abcdefghijk', 'abcdefghijk'],
    ['https://youtu.be/abcdefghijk?t=42', 'abcdefghijk'],
    ['https://www.youtube.com/shorts/abcdefghijk', 'abcdefghijk'],
    ['https://www.youtube.com/embed/abcdefghijk', 'abcdefghijk'],
    ['music.youtube.com/watch?v=abcdefghijk', 'abcdefghijk'],
    ['https://www.youtube.com/watch?v=tooshort', null],
    ['https://vimeo.com/123456', null]
  ])('reads the video id of %s', (url, id) => {
    expect(youtubeVideoId(url)).toBe(id);
  });

  it('only treats http(s) links on YouTube hosts as YouTube', () => {
    expect(isYouTubeUrl('https://m.youtube.com/watch?v=abcdefghijk')).toBe(true);
    expect(isYouTubeUrl('ftp://youtube.com/watch?v=abcdefghijk')).toBe(false);
    expect(isYouTubeUrl('https://notyoutube.com/watch?v=abcdefghijk')).toBe(false);
    expect(canonicalYoutubeUrl('abcdefghijk')).toBe(URL_);
  });
});

describe('youtube extractor', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchTranscript.mockReset();
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('uses captions and the oEmbed title', async () => {
    fetchTranscript.mockResolvedValue([
      { text: 'Bonjour &amp;#39;tout&amp;#39;', duration: 1.5, offset: 0 },
      { text: 'le   monde &amp;amp; co', duration: 2, offset: 1.5 }
    ]);
    fetchMock.mockResolvedValue(new Response(JSON.stringify({ title: ' Sample Talk ' }), { status: 200 }));

    const result = await youtubeExtractor.extract(input, { config: testConfig(), run: runCommand });

    expect(fetchTranscript).toHaveBeenCalledWith('abcdefghijk');
    expect(fetchMock).toHaveBeenCalledWith(`https://www.youtube.com/oembed?format=json&url=${encodeURIComponent(URL_)}`);
    expect(result.text).toBe("Title: Sample Talk\n\nBonjour 'tout' le monde & co");
    expect(result.metadata).toEqual({
      videoId: 'abcdefghijk',
      url: URL_,
      title: 'Sample Talk',
      transcriptSource: 'captions',
      segments: 2
    });
    expect(result.warnings).toBeUndefined();
  });

  it('keeps the transcript when the title lookup fails', async () => {
    fetchTranscript.mockResolvedValue([{ text: 'Only captions here', duration: 1, offset: 0 }]);
    fetchMock.mockRejectedValue(new Error('offline'));

    const result = await youtubeExtractor.extract(input, { config: testConfig(), run: runCommand });

    expect(result.text).toBe('Only captions here');
    expect(result.metadata.title).toBeNull();
  });

  it('stores the link without text when captions fail and no tools exist', async () => {
    fetchTranscript.mockRejectedValue(new Error('Transcript is disabled on this video'));

    const result = await youtubeExtractor.extract(input, { config: testConfig(), run: runCommand });

    expect(result.text).toBe('');
    expect(result.metadata).toEqual({
      videoId: 'abcdefghijk',
      url: URL_,
      transcriptionSkipped: true,
      transcriptError: 'Transcript is disabled on this video'
    });
    expect(result.warnings).toEqual([
      `No captions for ${URL_} and no local transcription tools: Transcript is disabled on this video`
    ]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('downloads and transcribes the audio when captions are empty', async () => {
    fetchTranscript.mockResolvedValue([{ text: '   ', duration: 1, offset: 0 }]);
    fetchMock.mockResolvedValue(new Response('not found', { status: 404 }));
    const { run, calls } = fakeRunner((command, args) => {
      if (command === 'yt-dlp') {
        writeFileSync(args[args.indexOf('-o') + 1].replace('%(ext)s', 'webm'), 'audio');
      }
      if (command === 'whisper-cli') {
        writeFileSync(`${args[args.indexOf('-of') + 1]}.txt`, 'Spoken words.\n');
      }
      return { stdout: '', stderr: '' };
    });
    const config = testConfig({
      capabilities: { ytDlp: true, ffmpeg: true, whisper: true },
      whisperModelPath: '/models/ggml-base.bin'
    });

    const result = await youtubeExtractor.extract(input, { config, run });

    expect(calls.map((c) => c.command)).toEqual(['yt-dlp', 'ffmpeg', 'whisper-cli']);
    expect(calls[0].args[calls[0].args.length - 1]).toBe(URL_);
    expect(calls[1].args[4]).toMatch(/download\.webm$/);
    expect(result.text).toBe('Spoken words.');
    expect(result.metadata).toEqual({
      videoId: 'abcdefghijk',
      url: URL_,
      title: null,
      transcriptSource: 'audio',
      durationSeconds: null,
      captionError: 'caption track is empty'
    });
  });

  it('fails when the download fails', async () => {
    fetchTranscript.mockRejectedValue(new Error('no captions'));
    const { run } = fakeRunner(() => {
      throw new Error('yt-dlp failed: Video unavailable');
    });
    const config = testConfig({
      capabilities: { ytDlp: true, ffmpeg: true, whisper: true },
      whisperModelPath: '/models/ggml-base.bin'
    });

    await expect(youtubeExtractor.extract(input, { config, run })).rejects.toThrow(
      `Could not download or transcribe ${URL_}: yt-dlp failed: Video unavailable`
    );
  });

  it('rejects a link without a video id', async () => {
    const bad = { origin: 'https://www.youtube.com/watch?v=short', location: 'https://www.youtube.com/watch?v=short', extension: '' };
    await expect(youtubeExtractor.extract(bad, { config: testConfig(), run: runCommand })).rejects.toBeInstanceOf(ExtractionError);
    expect(fetchTranscript).not.toHaveBeenCalled();
  });
});

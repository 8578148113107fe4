import type { SpeakerStats, TranscriptSegment } from './models';

const TIMING_SEPARATOR = '-->';
const SPEAKER_PATTERN = /^([^:\n]+):\s*([\s\S]*)$/;
const SKIPPED_BLOCKS = ['WEBVTT', 'NOTE', 'STYLE', 'REGION'];

export function parseVtt(content: string): TranscriptSegment[] {
  const blocks = content
    .replace(/^\uFEFF/, '')
    .replace(/\r\n?/g, '\n')
    .split(/\n{2,}/);

  const segments: TranscriptSegment[] = [];
  for (const block of blocks) {
    const lines = block.split('\n').filter(line => line.trim().length > 0);
    if (lines.length === 0 || SKIPPED_BLOCKS.some(keyword => lines[0].startsWith(keyword))) {
      continue;
    }

    const timingIndex = lines.findIndex(line => line.includes(TIMING_SEPARATOR));
    if (timingIndex === -1) {
      continue;
    }

    const [startRaw, endRaw] = lines[timingIndex].split(TIMING_SEPARATOR);
    const startTime = normalizeTimestamp(startRaw);
    const endTime = normalizeTimestamp(endRaw);
    const body = lines.slice(timingIndex + 1).join('\n').trim();
    if (!startTime || !endTime || !body) {
      continue;
    }

    const match = SPEAKER_PATTERN.exec(body);
    if (match) {
      segments.push({ startTime, endTime, speaker: match[1].trim(), text: match[2].trim() });
    } else {
      segments.push({ startTime, endTime, text: body });
    }
  }

  return segments;
}

export function mergeConsecutiveSegments(segments: TranscriptSegment[]): TranscriptSegment[] {
  const merged: TranscriptSegment[] = [];

  for (const segment of segments) {
    const previous = merged[merged.length - 1];
    if (previous && previous.speaker === segment.speaker) {
      merged[merged.length - 1] = {
        ...previous,
        endTime: segment.endTime,
        text: `${previous.text} ${segment.text}`
      };
      continue;
    }
    merged.push({ ...segment });
  }

  return merged;
}

export function formatTranscript(segments: TranscriptSegment[]): string {
  return segments.map(segment => `${segment.speaker ?? 'Unknown'}: ${segment.text}\n\n`).join('');
}

export function calculateSpeakerStats(segments: TranscriptSegment[]): Record<string, SpeakerStats> {
  const stats: Record<string, SpeakerStats> = {};

  for (const segment of segments) {
    if (!segment.speaker) {
      continue;
    }

    const entry = (stats[segment.speaker] ??= {
      totalSegments: 0,
      totalWords: 0,
      totalDurationSeconds: 0,
      firstTimestamp: segment.startTime,
      lastTimestamp: segment.endTime
    });

    entry.totalSegments += 1;
    entry.totalWords += segment.text.split(/\s+/).filter(Boolean).length;
    entry.totalDurationSeconds += toSeconds(segment.endTime) - toSeconds(segment.startTime);
    entry.lastTimestamp = segment.endTime;
  }

  return stats;
}

export function toSeconds(timestamp: string): number {
  return timestamp
    .split(':')
    .reduce((total, part) => total * 60 + Number.parseFloat(part), 0);
}

function normalizeTimestamp(raw: string | undefined): string | undefined {
  const token = raw?.trim().split(/\s+/)[0];
  if (!token || !/^(\d+:)?\d{2}:\d{2}\.\d{3}$/.test(token)) {
    return undefined;
  }
  const parts = token.split(':');
  if (parts.length === 2) {
    parts.unshift('00');
  }
  return parts.map((part, idx) => (idx === 0 ? part.padStart(2, '0') : part)).join(':');
}

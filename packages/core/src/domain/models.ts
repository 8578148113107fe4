import { z } from 'zod';

export const AnalysisTypeSchema = z.enum([
  'executive_summary',
  'pedagogical_analysis',
  'aha_moments',
  'engagement_analysis'
]);
export type AnalysisType = z.infer<typeof AnalysisTypeSchema>;

export const DEFAULT_ANALYSIS_TYPES: AnalysisType[] = [
  'executive_summary',
  'pedagogical_analysis',
  'aha_moments',
  'engagement_analysis'
];

export const TranscriptSegmentSchema = z.object({
  startTime: z.string(),
  endTime: z.string(),
  speaker: z.string().optional(),
  text: z.string()
});
export type TranscriptSegment = z.infer<typeof TranscriptSegmentSchema>;

export const ParticipantSchoolMappingSchema = z.record(z.string(), z.string());
export type ParticipantSchoolMapping = z.infer<typeof ParticipantSchoolMappingSchema>;

export const AnalysisRequestSchema = z.object({
  transcriptPath: z.string().min(1),
  chatLogPath: z.string().min(1).optional(),
  analysisTypes: z.array(AnalysisTypeSchema).min(1).default(DEFAULT_ANALYSIS_TYPES),
  participantSchoolMapping: ParticipantSchoolMappingSchema.optional()
});
export type AnalysisRequest = z.infer<typeof AnalysisRequestSchema>;

export interface TranscriptAnalysisInput {
  transcript: string;
  chatLog?: string;
  analysisTypes: AnalysisType[];
  participantSchoolMapping?: ParticipantSchoolMapping;
}

export type EngagementMetrics = Record<string, unknown>;

export interface AnalysisResult {
  executiveSummary?: string;
  pedagogicalAnalysis?: string;
  ahaMoments?: string;
  engagementMetrics?: EngagementMetrics;
}

export interface SpeakerStats {
  totalSegments: number;
  totalWords: number;
  totalDurationSeconds: number;
  firstTimestamp: string;
  lastTimestamp: string;
}

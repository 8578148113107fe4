import type { AnalysisType, ParticipantSchoolMapping } from '../domain/models';

const TRANSCRIPT_TURN = 'Human: Here is the session transcript:';

const INSTRUCTIONS: Record<AnalysisType, string> = {
  executive_summary: [
    'You are preparing an executive summary of a recorded teaching session for school leaders.',
    'Cover the purpose of the session, the main topics, key decisions and agreed next steps.',
    'Keep it to a few short paragraphs followed by a bulleted list of action items.'
  ].join(' '),
  pedagogical_analysis: [
    'You are an instructional coach reviewing a recorded teaching session.',
    'Assess the facilitation techniques used, how questions were posed, how participants were',
    'engaged and where the session could improve. Cite short quotes from the transcript as evidence.'
  ].join(' '),
  aha_moments: [
    'You are reviewing a recorded teaching session for moments of insight.',
    'List the points where a participant showed a breakthrough in understanding or a shift in',
    'perspective. For each, give the speaker, a short quote and why it matters.'
  ].join(' '),
  engagement_analysis: [
    'You are measuring participant engagement in a recorded teaching session.',
    'Use the participant to school mapping below to group participants by school.',
    'Respond with a single ```json fenced block containing an object with the keys',
    '"participants" (per participant contribution counts and a qualitative note),',
    '"schools" (per school totals) and "overall" (a short summary).'
  ].join(' ')
};

export function buildAnalysisPrompt(
  type: AnalysisType,
  transcript: string,
  options: { chatLog?: string; participantSchoolMapping?: ParticipantSchoolMapping } = {}
): string {
  const sections = [INSTRUCTIONS[type]];
  if (type === 'engagement_analysis') {
    sections.push(
      `Participant to school mapping:\n${JSON.stringify(options.participantSchoolMapping ?? {}, null, 2)}`
    );
  }
  sections.push(`${TRANSCRIPT_TURN}\n\n${transcript}`);

  let prompt = sections.join('\n\n');
  if (options.chatLog) {
    prompt += `\n\nAdditional context from chat log:\n${options.chatLog}`;
  }
  return prompt;
}

export function buildConciseSummaryPrompt(executiveSummary: string): string {
  return [
    "You're creating a concise 3-5 line summary for school leaders based on this executive summary.",
    'Focus on the most important insights and outcomes.',
    'Make it clear, direct, and actionable.',
    '',
    'Executive Summary:',
    executiveSummary
  ].join('\n');
}

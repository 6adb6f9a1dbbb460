const RESUME_PLACEHOLDER = '{{RESUME_TEXT}}';

const ANALYSIS_PROMPT = `Analyze this resume and output ONLY valid JSON with no other text.

${RESUME_PLACEHOLDER}

Output ONLY this JSON format (no markdown fences, no explanation):
{"overall_impression":"summary here","strengths":["item1","item2","item3"],"weaknesses":["item1","item2"],"key_skills":["item1","item2","item3","item4"],"recommendations":["item1","item2","item3"]}`;

/**
 * Embeds the resume text into the analysis prompt. The resume is the only
 * substitution and is inserted verbatim: braces or `$` patterns in it are
 * never interpreted.
 */
export function buildPrompt(resumeCore: string): string {
  return ANALYSIS_PROMPT.replace(RESUME_PLACEHOLDER, () => resumeCore);
}

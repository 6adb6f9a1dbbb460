import type { AnalysisRecord } from './types.js';
import { countWords } from './resume-section-extractor.js';

const MIN_STRENGTHS = 3;
const SHORT_RESUME_WORDS = 100;

const FILLER_STRENGTHS = [
  'Well-documented background',
  'Clear presentation of career history',
  'Relevant professional profile',
];

const GENERIC_KEY_SKILLS = [
  'Communication',
  'Problem-solving',
  'Team collaboration',
  'Technical proficiency',
];

const GENERIC_RECOMMENDATIONS = [
  'Add quantifiable achievements to each position',
  'Include specific project examples and results',
  'Highlight technical skills and tools mastered',
];

/**
 * Deterministic, keyword-based analysis used when the model reply cannot be
 * recovered. The content is generic by nature; only the shape is guaranteed.
 */
export function synthesize(sourceText: string): AnalysisRecord {
  const lower = sourceText.toLowerCase();
  const wordCount = countWords(sourceText);

  const hasSkills = lower.includes('skill');
  const hasExperience = lower.includes('experience') || lower.includes('worked');
  const hasEducation = lower.includes('education') || lower.includes('degree') || lower.includes('university');

  const strengths: string[] = [];
  if (hasEducation) strengths.push('Strong educational background');
  if (hasExperience) strengths.push('Demonstrated professional experience');
  if (hasSkills) strengths.push('Technical skill proficiency');
  for (const filler of FILLER_STRENGTHS) {
    if (strengths.length >= MIN_STRENGTHS) break;
    strengths.push(filler);
  }

  const weaknesses: string[] = [];
  if (lower.includes('no experience') || wordCount < SHORT_RESUME_WORDS) {
    weaknesses.push('Limited work history');
  } else {
    weaknesses.push('Consider highlighting recent achievements');
  }
  if (!hasEducation) {
    weaknesses.push('Education section could be expanded');
  }

  return {
    overall_impression:
      `Candidate with ${wordCount} words of documented experience. `
      + 'Resume demonstrates professional background across multiple areas.',
    strengths,
    weaknesses,
    key_skills: [...GENERIC_KEY_SKILLS],
    recommendations: [...GENERIC_RECOMMENDATIONS],
  };
}

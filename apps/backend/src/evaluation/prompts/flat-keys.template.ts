import type { EnrichmentField } from '../evaluation.types';
import type { EvaluationProfile } from '../profiles/evaluation.profiles';

// Small local models follow flat keys more reliably than nested objects.
const ENRICHMENT_INSTRUCTIONS: Record<EnrichmentField, string> = {
  grammar_corrections:
    'list of objects with keys "original", "corrected", "explanation" (real errors from the candidate text)',
  vocabulary_upgrades:
    'list of objects with keys "basic_word", "alternatives" (list of strings), "example" (words the candidate really used)',
  pronunciation_warnings:
    'list of objects with keys "word", "phonetic", "tip" (words from the transcript learners often mispronounce)',
  paragraph_feedback: 'list of strings (one short analysis per paragraph, in order)',
  strengths: 'list of strings (specific things done well in this answer)',
  improvement_priorities: 'list of strings (specific, actionable tips for this answer)',
};

export const buildFlatKeyInstructions = (profile: EvaluationProfile): string => {
  const lines = [
    'Return a JSON object with ALL of the keys below. Scores are IELTS bands from 0 to 9.',
    "Score the candidate's own work and quote its actual words in feedback. Do not invent errors.",
    '',
    'Required keys:',
  ];

  for (const criterion of profile.criteria) {
    lines.push(`- "${criterion.key}_score": number (0-9, ${criterion.description.toLowerCase()})`);
    lines.push(`- "${criterion.key}_feedback": string (feedback quoting the candidate's words)`);
  }
  lines.push('- "overall_feedback": string (two or three sentence summary of this answer)');
  for (const field of profile.enrichment) {
    lines.push(`- "${field}": ${ENRICHMENT_INSTRUCTIONS[field]}`);
  }

  return lines.join('\n');
};

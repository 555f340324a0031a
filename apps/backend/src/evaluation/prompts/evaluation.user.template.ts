import type { SpeakingInput, WritingInput, WritingTaskType } from '../evaluation.types';

export const MIN_WORDS: Record<WritingTaskType, number> = { 1: 150, 2: 250 };

export const countWords = (text: string): number => {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
};

export const buildSpeakingUserPrompt = (input: SpeakingInput): string => {
  const sections = [
    `## IELTS Speaking Part ${input.partNumber}`,
    `**Question:** ${input.questionText}`,
    `**Candidate's answer (transcribed from speech):**\n${input.transcript}`,
  ];

  if (input.referenceAnswer?.trim()) {
    sections.push(
      `**Reference answer (shows the scope of the question only; do not score against it):**\n${input.referenceAnswer.trim()}`,
    );
  }

  return `${sections.join('\n\n')}\n`;
};

export const buildWritingUserPrompt = (input: WritingInput): string => {
  const wordCount = countWords(input.essayText);
  const sections = [
    `## IELTS Writing Task ${input.taskType}`,
    `**Question:**\n${input.promptText}`,
    `**Candidate's essay (${wordCount} words, minimum ${MIN_WORDS[input.taskType]}):**\n${input.essayText}`,
  ];

  if (input.chartData?.trim()) {
    sections.push(`**Chart data (JSON):**\n${input.chartData.trim()}`);
  }

  return `${sections.join('\n\n')}\n`;
};

import { readFileSync } from 'fs';
import { resolveAssetPath } from '../../common/utils/asset-path';
import type { EvaluationProfile } from '../profiles/evaluation.profiles';

const cache = new Map<string, string>();

export const loadSystemPrompt = (profile: EvaluationProfile): string => {
  const cached = cache.get(profile.systemPromptAsset);
  if (cached !== undefined) {
    return cached;
  }
  const path = resolveAssetPath('evaluation', `prompts/${profile.systemPromptAsset}`);
  const prompt = readFileSync(path, 'utf-8').trim();
  cache.set(profile.systemPromptAsset, prompt);
  return prompt;
};

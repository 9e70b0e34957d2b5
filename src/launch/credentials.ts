/**
 * API key check
 *
 * Sends a one-line prompt to the configured Gemini model to prove the key works.
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import { CredentialCheckError, PlaceholderCredentialError } from '../core/errors.js';
import { API_KEY_VAR, isConfigured, type LauncherEnvironment } from './env.js';

export const VERIFY_PROMPT = 'Say hello';

export type GenerateText = (apiKey: string, model: string, prompt: string) => Promise<string>;

export const geminiGenerate: GenerateText = async (apiKey, model, prompt) => {
  const genAI = new GoogleGenerativeAI(apiKey);
  const result = await genAI.getGenerativeModel({ model }).generateContent(prompt);
  return result.response.text();
};

export interface VerifyResult {
  model: string;
  reply: string;
}

export async function verifyApiKey(
  env: LauncherEnvironment,
  generate: GenerateText = geminiGenerate
): Promise<VerifyResult> {
  if (!isConfigured(env.apiKey)) {
    throw new PlaceholderCredentialError(env.path, API_KEY_VAR);
  }

  try {
    const reply = await generate(env.apiKey, env.model, VERIFY_PROMPT);
    return { model: env.model, reply: reply.trim() };
  } catch (error) {
    throw new CredentialCheckError(env.model, error instanceof Error ? error.message : String(error));
  }
}

import fs from 'fs';
import path from 'path';
import { errorLog, infoLog, warnLog } from '../utils/logger';

export const BUILTIN_PROMPT =
  'You are a professional literary translator. Translate the text you are given into ' +
  '{{targetLanguage}}. Preserve the original style, tone and literary quality. ' +
  'Keep the paragraph breaks and the formatting of the source.';

export function renderPrompt(template: string, targetLanguage: string): string {
  return template.replace(/\{\{\s*targetLanguage\s*\}\}/g, targetLanguage).trim();
}

/**
 * Charge les instructions par défaut depuis un fichier texte. En cas d'échec,
 * le prompt intégré est utilisé.
 */
export async function loadDefaultPrompt(filePath: string, targetLanguage: string): Promise<string> {
  const resolved = path.resolve(filePath);
  try {
    const template = await fs.promises.readFile(resolved, 'utf-8');
    if (!template.trim()) {
      warnLog(`Prompt par défaut vide (${resolved}), utilisation du prompt intégré`);
      return renderPrompt(BUILTIN_PROMPT, targetLanguage);
    }
    infoLog(`Prompt par défaut chargé depuis ${resolved}`);
    return renderPrompt(template, targetLanguage);
  } catch (error) {
    errorLog('Erreur lors du chargement du prompt par défaut:', error instanceof Error ? error.message : error);
    return renderPrompt(BUILTIN_PROMPT, targetLanguage);
  }
}

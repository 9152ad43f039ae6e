import fs from 'fs-extra';
import path from 'path';
import { fileURLToPath } from 'url';
import type { RendererKind } from './render';
import { ResourceMissingError } from './errors';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const PROMPTS_DIR = path.resolve(__dirname, '../../prompts');

export type FormatId = 'original' | 'brainrot' | 'explainer';

export interface OutputFormat {
  id: FormatId;
  label: string;
  /** Prompt file under prompts/; absent means no model rewrite. */
  promptFile?: string;
  renderer: RendererKind;
}

export const FORMATS: Record<FormatId, OutputFormat> = {
  original: {
    id: 'original',
    label: 'Original Transcript',
    renderer: 'basic',
  },
  brainrot: {
    id: 'brainrot',
    label: 'Brainrot Transcript (Gen Z)',
    promptFile: 'brainrot.txt',
    renderer: 'basic',
  },
  explainer: {
    id: 'explainer',
    label: 'AI Explainer (Detailed Notes)',
    promptFile: 'explainer.txt',
    renderer: 'styled',
  },
};

export const FORMAT_IDS = Object.keys(FORMATS).filter(isFormatId);

export function isFormatId(v: unknown): v is FormatId {
  return v === 'original' || v === 'brainrot' || v === 'explainer';
}

/** Instruction prompt for a format, or null when the format keeps the transcript as-is. */
export async function loadPrompt(format: OutputFormat, promptsDir = PROMPTS_DIR): Promise<string | null> {
  if (!format.promptFile) return null;
  const file = path.join(promptsDir, format.promptFile);
  if (!(await fs.pathExists(file))) {
    throw new ResourceMissingError(file, `Prompt for format '${format.id}' is missing`);
  }
  return (await fs.readFile(file, 'utf8')).trim();
}

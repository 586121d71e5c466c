import fs from 'fs';
import path from 'path';

export interface PromptTemplates {
  system: string;
  user: string;
  segmentNotes: string;
  batchSystem: string;
}

export const DEFAULT_PROMPTS_DIR = path.join(__dirname, '../../prompts');

// Load prompt templates
export function loadPrompts(dir: string = DEFAULT_PROMPTS_DIR): PromptTemplates {
  const read = (name: string): string => fs.readFileSync(path.join(dir, name), 'utf-8').trim();
  return {
    system: read('summary-system.txt'),
    user: read('summary-user.txt'),
    segmentNotes: read('segment-notes.txt'),
    batchSystem: read('batch-system.txt'),
  };
}

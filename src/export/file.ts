import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Resume } from '../resume/document.js';
import { renderResume } from '../resume/renderer.js';
import { renderText } from '../resume/text.js';
import { logger } from '../observability/logger.js';

const log = logger.child({ module: 'export:file' });

export function defaultOutputName(resume: Resume): string {
  return `${renderText(resume.contactInfo.name)}_resume.html`;
}

export interface SaveResumeResult {
  path: string;
  bytes: number;
}

/**
 * Renders the resume and writes it as a single HTML file. Write failures
 * are left to the caller.
 */
export async function saveResume(
  resume: Resume,
  filename: string = defaultOutputName(resume),
  template?: string,
): Promise<SaveResumeResult> {
  const html = renderResume(resume, template);
  const path = resolve(filename);

  await writeFile(path, html, 'utf-8');

  const bytes = Buffer.byteLength(html, 'utf-8');
  log.info({ path, bytes }, 'Resume written');
  return { path, bytes };
}

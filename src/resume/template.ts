import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { env } from '../config/env.js';
import { logger } from '../observability/logger.js';
import { TemplateError } from './errors.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const BUNDLED_TEMPLATE_PATH = resolve(__dirname, '../../templates/resume.html');

/**
 * Placeholder tokens of the page template. Each must occur exactly once;
 * the template is otherwise opaque.
 */
export const TEMPLATE_MARKERS = {
  name: '__NAME__',
  contactInfo: '__CONTACT_INFO__',
  summary: '__SUMMARY__',
  sections: '__SECTIONS__',
} as const;

export type TemplateSlot = keyof typeof TEMPLATE_MARKERS;

export type TemplateFragments = Record<TemplateSlot, string>;

const SLOTS: readonly TemplateSlot[] = ['name', 'contactInfo', 'summary', 'sections'];

const SLOT_BY_MARKER = new Map<string, TemplateSlot>(SLOTS.map((slot): [string, TemplateSlot] => [TEMPLATE_MARKERS[slot], slot]));

const MARKER_PATTERN = new RegExp(SLOTS.map((slot) => TEMPLATE_MARKERS[slot]).join('|'), 'g');

function countOccurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

export function assertTemplate(template: string): void {
  const problems: string[] = [];
  for (const slot of SLOTS) {
    const marker = TEMPLATE_MARKERS[slot];
    const count = countOccurrences(template, marker);
    if (count !== 1) {
      problems.push(`${marker} found ${count} times`);
    }
  }

  if (problems.length > 0) {
    throw new TemplateError(`Each template marker must appear exactly once: ${problems.join(', ')}`);
  }
}

let _template: string | null = null;

/**
 * Reads and validates a page template. Without a path, the template comes
 * from `RESUME_TEMPLATE_PATH` or the bundled `templates/resume.html`, and is
 * cached after the first read.
 */
export function loadTemplate(path?: string): string {
  if (path === undefined && _template !== null) return _template;

  const log = logger.child({ module: 'resume:template' });
  const templatePath = path ?? env.RESUME_TEMPLATE_PATH ?? BUNDLED_TEMPLATE_PATH;

  const template = readFileSync(templatePath, 'utf-8');
  assertTemplate(template);
  log.debug({ templatePath }, 'Template loaded');

  if (path === undefined) _template = template;
  return template;
}

/**
 * Literal, single-pass substitution. Fragments are inserted as-is (`$&` and
 * friends included) and are never scanned for markers themselves.
 */
export function fillTemplate(template: string, fragments: TemplateFragments): string {
  assertTemplate(template);

  return template.replace(MARKER_PATTERN, (marker) => {
    const slot = SLOT_BY_MARKER.get(marker);
    return slot ? fragments[slot] : marker;
  });
}

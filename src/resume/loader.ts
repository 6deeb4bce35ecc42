import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { logger } from '../observability/logger.js';
import { contactInfo, resume, section, sectionEntry, summary, type Resume } from './document.js';
import { ResumeDefinitionError } from './errors.js';
import { bold, bulletedList, concat, italic, link, underline, type TextLike } from './text.js';

const log = logger.child({ module: 'resume:loader' });

/**
 * Text as written in a definition file: a plain string, or an object naming
 * exactly one formatting, e.g. `{ bold: "Go" }` or
 * `{ link: "Blog", url: "https://example.com", icon: true }`.
 */
export type TextSpec =
  | string
  | { bold: TextSpec }
  | { italic: TextSpec }
  | { underline: TextSpec }
  | { link: string; url: string; icon?: boolean }
  | { list: TextSpec[] }
  | { concat: TextSpec[] };

/** Before validation, bare YAML numbers such as `dates: 2017` are accepted and read as text. */
export type TextSpecInput =
  | string
  | number
  | { bold: TextSpecInput }
  | { italic: TextSpecInput }
  | { underline: TextSpecInput }
  | { link: string; url: string; icon?: boolean }
  | { list: TextSpecInput[] }
  | { concat: TextSpecInput[] };

const textSpecSchema: z.ZodType<TextSpec, z.ZodTypeDef, TextSpecInput> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().transform((value) => String(value)),
    z.object({ bold: textSpecSchema }).strict(),
    z.object({ italic: textSpecSchema }).strict(),
    z.object({ underline: textSpecSchema }).strict(),
    z.object({ link: z.string(), url: z.string(), icon: z.boolean().optional() }).strict(),
    z.object({ list: z.array(textSpecSchema) }).strict(),
    z.object({ concat: z.array(textSpecSchema) }).strict(),
  ]),
);

const entrySchema = z
  .object({
    title: textSpecSchema.nullish(),
    caption: textSpecSchema.nullish(),
    location: textSpecSchema.nullish(),
    dates: textSpecSchema.nullish(),
    description: textSpecSchema.nullish(),
  })
  .strict();

const definitionSchema = z
  .object({
    contact: z
      .object({
        name: textSpecSchema,
        details: z.array(textSpecSchema).nullish(),
        tagline: textSpecSchema.nullish(),
      })
      .strict(),
    summary: z
      .object({
        title: textSpecSchema.nullish(),
        description: textSpecSchema.nullish(),
      })
      .strict()
      .nullish(),
    sections: z
      .array(
        z
          .object({
            title: textSpecSchema,
            entries: z
              .array(entrySchema)
              .nullish()
              .transform((entries) => entries ?? []),
          })
          .strict(),
      )
      .nullish()
      .transform((sections) => sections ?? []),
  })
  .strict();

export type ResumeDefinition = z.infer<typeof definitionSchema>;

export type DefinitionFormat = 'yaml' | 'json';

export function toText(spec: TextSpec): TextLike {
  if (typeof spec === 'string') return spec;
  if ('bold' in spec) return bold(toText(spec.bold));
  if ('italic' in spec) return italic(toText(spec.italic));
  if ('underline' in spec) return underline(toText(spec.underline));
  if ('link' in spec) return link(spec.link, spec.url, { icon: spec.icon });
  if ('list' in spec) return bulletedList(spec.list.map(toText));
  return concat(...spec.concat.map(toText));
}

// A blank YAML key (`tagline:`) arrives as null and counts as absent
function optionalText(spec: TextSpec | null | undefined): TextLike | undefined {
  return spec === undefined || spec === null ? undefined : toText(spec);
}

export function buildResume(definition: ResumeDefinition): Resume {
  const { contact } = definition;

  return resume({
    contactInfo: contactInfo({
      name: toText(contact.name),
      details: contact.details?.map(toText),
      tagLine: optionalText(contact.tagline),
    }),
    summary: definition.summary
      ? summary({
          title: optionalText(definition.summary.title),
          description: optionalText(definition.summary.description),
        })
      : undefined,
    sections: definition.sections.map((s) =>
      section(
        toText(s.title),
        s.entries.map((entry) =>
          sectionEntry({
            title: optionalText(entry.title),
            caption: optionalText(entry.caption),
            location: optionalText(entry.location),
            dates: optionalText(entry.dates),
            description: optionalText(entry.description),
          }),
        ),
      ),
    ),
  });
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseResumeDefinition(source: string, format: DefinitionFormat = 'yaml'): Resume {
  let raw: unknown;
  try {
    raw = format === 'json' ? JSON.parse(source) : yaml.load(source);
  } catch (err) {
    throw new ResumeDefinitionError(`Resume definition is not valid ${format.toUpperCase()}`, { cause: err });
  }

  const result = definitionSchema.safeParse(raw);
  if (!result.success) {
    throw new ResumeDefinitionError(`Invalid resume definition: ${formatIssues(result.error)}`);
  }

  return buildResume(result.data);
}

export function loadResumeDefinition(path: string): Resume {
  const format: DefinitionFormat = extname(path).toLowerCase() === '.json' ? 'json' : 'yaml';
  const source = readFileSync(path, 'utf-8');
  const loaded = parseResumeDefinition(source, format);
  log.info({ path, format, sections: loaded.sections.length }, 'Resume definition loaded');
  return loaded;
}

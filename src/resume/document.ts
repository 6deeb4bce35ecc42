import { ResumeDefinitionError } from './errors.js';
import { renderText, type TextLike } from './text.js';

/** One line item of a section: a job, a talk, a degree. */
export interface SectionEntry {
  readonly title?: TextLike;
  /** Role or subtitle, shown in parentheses. */
  readonly caption?: TextLike;
  readonly location?: TextLike;
  readonly dates?: TextLike;
  readonly description?: TextLike;
}

export interface Section {
  readonly title: TextLike;
  readonly entries: readonly SectionEntry[];
}

export interface ContactInfo {
  readonly name: TextLike;
  /** Phone, email, profile links. Shown inline, separated by bars. */
  readonly details?: readonly TextLike[];
  readonly tagLine?: TextLike;
}

/** Introductory block such as a summary, objective or research statement. */
export interface Summary {
  readonly title?: TextLike;
  readonly description?: TextLike;
}

export interface Resume {
  readonly contactInfo: ContactInfo;
  readonly summary?: Summary;
  readonly sections: readonly Section[];
}

export function sectionEntry(fields: SectionEntry = {}): SectionEntry {
  return Object.freeze({ ...fields });
}

export function section(title: TextLike, entries: readonly SectionEntry[]): Section {
  return Object.freeze({ title, entries: Object.freeze(entries.map((entry) => sectionEntry(entry))) });
}

export function summary(fields: Summary = {}): Summary {
  return Object.freeze({ ...fields });
}

export function contactInfo(fields: ContactInfo): ContactInfo {
  if (renderText(fields.name).trim() === '') {
    throw new ResumeDefinitionError('Contact info requires a non-empty name');
  }

  return Object.freeze({
    ...fields,
    details: fields.details ? Object.freeze([...fields.details]) : undefined,
  });
}

export interface ResumeFields {
  contactInfo: ContactInfo;
  summary?: Summary;
  sections?: readonly Section[];
}

export function resume(fields: ResumeFields): Resume {
  return Object.freeze({
    contactInfo: contactInfo(fields.contactInfo),
    summary: fields.summary && summary(fields.summary),
    sections: Object.freeze((fields.sections ?? []).map((s) => section(s.title, s.entries))),
  });
}

import type { ContactInfo, Resume, Section, Summary } from './document.js';
import { fillTemplate, loadTemplate } from './template.js';
import { isPresent, renderText } from './text.js';

export function renderContactInfo(info: ContactInfo): string {
  let html = `<h1 id="name">${renderText(info.name)}</h1>\n`;

  if (info.details && info.details.length > 0) {
    html += '<ul id="contact">\n';
    for (const detail of info.details) {
      html += `<li>${renderText(detail)}</li>\n`;
    }
    html += '</ul>\n';
  }

  // Unlike every other optional field, an absent tagline still emits a line break
  html += isPresent(info.tagLine) ? `<p id="objective">${renderText(info.tagLine)}</p>\n` : '<br>\n';

  return html;
}

export function renderSummary(summary: Summary | undefined): string {
  if (!summary) return '';

  let html = "<div class='container'>\n<section>\n";
  if (isPresent(summary.title)) {
    html += `<h2>${renderText(summary.title)}</h2>\n`;
  }
  html += '<div class="entry">\n';
  if (isPresent(summary.description)) {
    html += `<p>\n${renderText(summary.description)}</p>\n`;
  }
  html += '</div>\n</section>\n</div>\n';

  return html;
}

export function renderSection(section: Section): string {
  let html = "<div class='container'>\n<section>\n";
  if (isPresent(section.title)) {
    html += `<h2>${renderText(section.title)}</h2>\n`;
  }

  for (const entry of section.entries) {
    html += '<div class="entry">\n';
    if (isPresent(entry.title)) html += `<h3>${renderText(entry.title)}</h3>\n`;
    if (isPresent(entry.caption)) html += `<span class="role">${renderText(entry.caption)}</span>\n`;
    if (isPresent(entry.location)) html += `<span class="loc">${renderText(entry.location)}</span>\n`;
    if (isPresent(entry.dates)) html += `<span class="date">${renderText(entry.dates)}</span>\n`;
    if (isPresent(entry.description)) html += `<p>\n${renderText(entry.description)}</p>\n`;
    html += '</div>\n';
  }

  html += '</section>\n</div>\n';
  return html;
}

export function renderSections(sections: readonly Section[]): string {
  return sections.map(renderSection).join('');
}

/**
 * Renders the whole page. Pure over the resume tree: the same resume and
 * template always produce the same document.
 */
export function renderResume(resume: Resume, template: string = loadTemplate()): string {
  return fillTemplate(template, {
    name: renderText(resume.contactInfo.name),
    contactInfo: renderContactInfo(resume.contactInfo),
    summary: renderSummary(resume.summary),
    sections: renderSections(resume.sections),
  });
}

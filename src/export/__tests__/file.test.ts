import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('node:fs/promises', () => ({
  writeFile: vi.fn(),
}));

import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { defaultOutputName, saveResume } from '../file.js';
import { contactInfo, resume } from '../../resume/document.js';
import { bold } from '../../resume/text.js';

const TEMPLATE = '__NAME__|__CONTACT_INFO__|__SUMMARY__|__SECTIONS__';

const ada = resume({ contactInfo: contactInfo({ name: 'Ada Lovelace' }) });

describe('defaultOutputName', () => {
  it('derives the file name from the contact name', () => {
    expect(defaultOutputName(ada)).toBe('Ada Lovelace_resume.html');
  });

  it('uses the rendered name', () => {
    const r = resume({ contactInfo: contactInfo({ name: bold('Ada') }) });
    expect(defaultOutputName(r)).toBe('<strong>Ada</strong>_resume.html');
  });
});

describe('saveResume', () => {
  beforeEach(() => {
    vi.mocked(writeFile).mockReset();
    vi.mocked(writeFile).mockResolvedValue(undefined);
  });

  it('writes the rendered document to the given file', async () => {
    const result = await saveResume(ada, 'out/ada.html', TEMPLATE);

    const html = 'Ada Lovelace|<h1 id="name">Ada Lovelace</h1>\n<br>\n||';
    expect(writeFile).toHaveBeenCalledWith(resolve('out/ada.html'), html, 'utf-8');
    expect(result).toEqual({ path: resolve('out/ada.html'), bytes: html.length });
  });

  it('falls back to the default file name', async () => {
    const { path } = await saveResume(ada, undefined, TEMPLATE);
    expect(path).toBe(resolve('Ada Lovelace_resume.html'));
  });

  it('propagates write errors', async () => {
    vi.mocked(writeFile).mockRejectedValueOnce(new Error('EACCES: permission denied'));
    await expect(saveResume(ada, 'ada.html', TEMPLATE)).rejects.toThrow('EACCES: permission denied');
  });
});

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('node:fs/promises', () => ({
  writeFile: vi.fn(),
}));

const log = vi.hoisted(() => ({
  trace: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
}));

vi.mock('../observability/logger.js', () => ({
  logger: { child: () => log },
}));

import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { generateFromArgs, parseCliArgs, SCRIPT_USAGE, UsageError } from '../cli.js';
import { contactInfo, resume } from '../resume/document.js';

const ada = resume({ contactInfo: contactInfo({ name: 'Ada' }) });

describe('parseCliArgs', () => {
  it('reads the short output option', () => {
    expect(parseCliArgs(['-o', 'cv.html'])).toEqual({ output: 'cv.html', definition: undefined, help: false });
  });

  it('reads a definition file and the long output option', () => {
    expect(parseCliArgs(['ada.yml', '--output', 'cv.html'])).toEqual({
      output: 'cv.html',
      definition: 'ada.yml',
      help: false,
    });
  });

  it('defaults to no output', () => {
    expect(parseCliArgs([])).toEqual({ output: undefined, definition: undefined, help: false });
  });

  it('reads the help flag', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['--bogus'])).toThrow(UsageError);
  });

  it('rejects an output option without a value', () => {
    expect(() => parseCliArgs(['--output'])).toThrow(UsageError);
  });

  it('rejects more than one definition file', () => {
    expect(() => parseCliArgs(['a.yml', 'b.yml'])).toThrow('Expected at most one definition file, got 2');
  });
});

describe('generateFromArgs', () => {
  beforeEach(() => {
    vi.mocked(writeFile).mockReset();
    vi.mocked(writeFile).mockResolvedValue(undefined);
    log.info.mockClear();
  });

  it('logs one info line per written resume', async () => {
    await generateFromArgs(ada, ['-o', 'cv.html']);
    expect(log.info).toHaveBeenCalledTimes(1);
    expect(log.info).toHaveBeenCalledWith({ path: resolve('cv.html'), bytes: expect.any(Number) }, 'Resume written');
  });

  it('writes to the requested output', async () => {
    const path = await generateFromArgs(ada, ['--output', 'cv.html']);
    expect(path).toBe(resolve('cv.html'));
    expect(vi.mocked(writeFile).mock.calls[0][0]).toBe(resolve('cv.html'));
  });

  it('writes to the default name without an output option', async () => {
    expect(await generateFromArgs(ada, [])).toBe(resolve('Ada_resume.html'));
  });

  it('rejects a positional argument', async () => {
    await expect(generateFromArgs(ada, ['extra.yml'])).rejects.toThrow('Unexpected argument: extra.yml');
    expect(writeFile).not.toHaveBeenCalled();
  });

  it('prints usage for help and writes nothing', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    try {
      expect(await generateFromArgs(ada, ['--help'])).toBeNull();
      expect(write).toHaveBeenCalledWith(`${SCRIPT_USAGE}\n`);
      expect(writeFile).not.toHaveBeenCalled();
    } finally {
      write.mockRestore();
    }
  });
});

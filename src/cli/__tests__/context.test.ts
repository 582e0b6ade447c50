import { describe, it, expect, vi, beforeAll, afterEach } from 'vitest';
import chalk from 'chalk';

import { createContext, parseTopK, withKnowledgeBase } from '../context.js';
import { DEFAULT_CONFIG } from '../../config/index.js';
import { ValidationError } from '../../errors/index.js';
import { createKnowledgeBase } from '../../knowledge-base/index.js';
import { silentLogger } from '../../utils/index.js';

describe('createContext', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps stdout clean under --json', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const ctx = createContext({ verbose: true, json: true });

    ctx.log('hello');
    ctx.debug('details');
    ctx.error('boom');

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith('{"error":"boom"}');
  });

  it('prints debug output only with --verbose', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    createContext({ verbose: false, json: false }).debug('hidden');
    createContext({ verbose: true, json: false }).debug('shown');

    expect(logSpy.mock.calls).toEqual([['[debug] shown']]);
  });

  it('prefixes warnings', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    createContext({ verbose: false, json: false }).warn('skipped scan.pdf');

    expect(warnSpy).toHaveBeenCalledWith('Warning: skipped scan.pdf');
  });

  it('hands itself to the knowledge base factory as the logger', () => {
    const kb = createKnowledgeBase(DEFAULT_CONFIG, { dbPath: ':memory:', logger: silentLogger });
    const factory = vi.fn().mockReturnValue(kb);
    const ctx = createContext({ verbose: false, json: false }, factory);

    expect(ctx.openKnowledgeBase()).toBe(kb);
    expect(factory).toHaveBeenCalledWith(ctx);
    kb.close();
  });
});

describe('withKnowledgeBase', () => {
  it('closes the knowledge base when the command throws', async () => {
    const kb = createKnowledgeBase(DEFAULT_CONFIG, { dbPath: ':memory:', logger: silentLogger });
    const closeSpy = vi.spyOn(kb, 'close');
    const ctx = createContext({ verbose: false, json: false }, () => kb);

    await expect(
      withKnowledgeBase(ctx, () => {
        throw new Error('command failed');
      })
    ).rejects.toThrow('command failed');
    expect(closeSpy).toHaveBeenCalledTimes(1);
  });

  it('returns the command result', async () => {
    const kb = createKnowledgeBase(DEFAULT_CONFIG, { dbPath: ':memory:', logger: silentLogger });
    const ctx = createContext({ verbose: false, json: false }, () => kb);

    await expect(withKnowledgeBase(ctx, (opened) => opened.listProjects())).resolves.toEqual([]);
  });
});

describe('parseTopK', () => {
  it('passes through an absent value', () => {
    expect(parseTopK(undefined)).toBeUndefined();
  });

  it('parses a positive integer', () => {
    expect(parseTopK('7')).toBe(7);
  });

  it.each(['0', '2.5', '101', 'ten'])('rejects %s', (value) => {
    expect(() => parseTopK(value)).toThrow(ValidationError);
  });
});

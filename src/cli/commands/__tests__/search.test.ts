/**
 * Tests for search command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { createSearchCommand } from '../search.js';
import { ProjectNotFoundError, ValidationError } from '../../../errors/index.js';
import { createHarness, ingestAlpha, type CommandHarness } from './harness.js';

describe('createSearchCommand', () => {
  let harness: CommandHarness;

  beforeEach(async () => {
    harness = createHarness();
    await ingestAlpha(harness);
  });

  afterEach(() => {
    harness.cleanup();
    vi.restoreAllMocks();
  });

  it('takes a project and a multi-word query', () => {
    const cmd = createSearchCommand(() => harness.ctx);
    expect(cmd.registeredArguments.map((arg) => [arg.name(), arg.variadic])).toEqual([
      ['project', false],
      ['query', true],
    ]);
  });

  it('prints ranked passages with their source', async () => {
    await harness.run(createSearchCommand(() => harness.ctx), ['search', 'alpha', 'What', 'is', 'the', 'budget?']);

    expect(harness.logs).toHaveLength(2);
    expect(harness.logs[0]).toMatch(/^1\. proposal\.txt #0 {2}0\.\d{3}$/);
    expect(harness.logs[1]).toBe('   File: proposal.txt Location: alpha Budget: $50,000 for education.');
  });

  it('prints results as JSON with --json', async () => {
    const json = createHarness({ json: true });
    await ingestAlpha(json);
    const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await json.run(createSearchCommand(() => json.ctx), ['search', 'alpha', 'budget']);

    const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(output).toMatchObject({
      project: 'alpha',
      query: 'budget',
      results: [{ chunkId: 'proposal.txt#0', sourcePath: 'proposal.txt', ordinal: 0 }],
    });
    json.cleanup();
  });

  it('rejects a non-numeric --top-k', async () => {
    await expect(
      harness.run(createSearchCommand(() => harness.ctx), ['search', 'alpha', 'budget', '--top-k', 'many'])
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it('reports an unknown project', async () => {
    await expect(
      harness.run(createSearchCommand(() => harness.ctx), ['search', 'missing', 'budget'])
    ).rejects.toBeInstanceOf(ProjectNotFoundError);
  });
});

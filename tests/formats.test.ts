import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { FORMAT_IDS, FORMATS, isFormatId, loadPrompt } from '../src/pipeline/formats';
import { ResourceMissingError } from '../src/pipeline/errors';

describe('formats', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await fs.remove(dir);
    dir = undefined;
  });

  it('lists every format with its renderer', () => {
    expect(FORMAT_IDS).toEqual(['original', 'brainrot', 'explainer']);
    expect(FORMATS.original.renderer).toBe('basic');
    expect(FORMATS.brainrot.renderer).toBe('basic');
    expect(FORMATS.explainer.renderer).toBe('styled');
    expect(isFormatId('explainer')).toBe(true);
    expect(isFormatId('poem')).toBe(false);
  });

  it('has no prompt for the original transcript', async () => {
    await expect(loadPrompt(FORMATS.original)).resolves.toBeNull();
  });

  it('loads the shipped prompts', async () => {
    const explainer = await loadPrompt(FORMATS.explainer);
    expect(explainer).toMatch(/^make detailed points out of this, do not skip details/);
    const brainrot = await loadPrompt(FORMATS.brainrot);
    expect(brainrot?.length).toBeGreaterThan(0);
  });

  it('trims prompt files', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tubescribe-prompts-'));
    await fs.writeFile(path.join(dir, 'brainrot.txt'), '\n  Talk like this.  \n');
    await expect(loadPrompt(FORMATS.brainrot, dir)).resolves.toBe('Talk like this.');
  });

  it('fails when a prompt file is missing', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tubescribe-prompts-'));
    await expect(loadPrompt(FORMATS.explainer, dir)).rejects.toBeInstanceOf(ResourceMissingError);
  });
});

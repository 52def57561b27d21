import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { resetConfig } from '../../../src/config/index.js';
import { getToolDefinitions, handleToolCall } from '../../../src/tools/index.js';

const NOTE = [
  '#+title: Tool Note',
  '#+filetags: :alpha:',
  '#+identifier: 20240101T120000',
  '',
  'Hello.',
  '',
].join('\n');

describe('tools', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'publisher-tools-'));
    await mkdir(join(root, 'notes'));
    await writeFile(join(root, 'notes', '20240101T120000--tool-note.org'), NOTE);
    await writeFile(join(root, 'config.yaml'), '');

    vi.stubEnv('NOTE_PUBLISHER_CONFIG_PATH', join(root, 'config.yaml'));
    vi.stubEnv('NOTE_PUBLISHER_NOTES_DIR', join(root, 'notes'));
    vi.stubEnv('NOTE_PUBLISHER_BASE_DIR', join(root, 'site'));
    resetConfig();
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    resetConfig();
    await rm(root, { recursive: true, force: true });
  });

  it('lists the publishing tools', () => {
    expect(getToolDefinitions().map((tool) => tool.name)).toEqual([
      'publish_note',
      'publish_all',
      'preview_frontmatter',
      'render_link',
    ]);
  });

  it('rejects unknown tools', async () => {
    expect(await handleToolCall('nope', {})).toEqual({
      success: false,
      error: 'Unknown tool: nope',
      code: 'UNKNOWN_TOOL',
    });
  });

  describe('render_link', () => {
    it('renders internal references with the configured class', async () => {
      const result = await handleToolCall('render_link', { link: 'denote:20240101T120000::#h', label: 'Go' });
      expect(result).toEqual({
        success: true,
        data: {
          type: 'denote',
          markup: '<a href="denote:20240101T120000.html#h" class="internal-link">Go</a>',
        },
      });
    });

    it('uses an explicit style class', async () => {
      const result = await handleToolCall('render_link', { link: 'denote:20240101T120000', style_class: 'x' });
      expect(result).toEqual({
        success: true,
        data: { type: 'denote', markup: '<a href="denote:20240101T120000.html" class="x">20240101T120000</a>' },
      });
    });

    it('renders other links as Markdown', async () => {
      const result = await handleToolCall('render_link', { link: 'https://example.org' });
      expect(result).toEqual({ success: true, data: { type: 'https', markup: '<https://example.org>' } });
    });

    it('validates input', async () => {
      const result = await handleToolCall('render_link', {});
      expect(result).toEqual({ success: false, error: 'link: Required', code: 'VALIDATION_ERROR' });
    });
  });

  describe('preview_frontmatter', () => {
    it('renders the requested fields', async () => {
      const result = await handleToolCall('preview_frontmatter', {
        path: '20240101T120000--tool-note.org',
        fields: ['title', 'tags'],
      });
      expect(result).toEqual({
        success: true,
        data: {
          path: '20240101T120000--tool-note.org',
          identifier: '20240101T120000',
          fields: ['title', 'tags'],
          frontMatter: '---\ntitle: "Tool Note"\ntags: ["alpha"]\n---\n',
        },
      });
    });

    it('reports missing notes', async () => {
      const result = await handleToolCall('preview_frontmatter', { path: 'missing.org' });
      expect(result).toEqual({ success: false, error: 'Note not found: missing.org', code: 'NOTE_NOT_FOUND' });
    });
  });

  describe('publish_note', () => {
    it('writes the published file', async () => {
      const outputPath = join(root, 'site', 'posts', '20240101T120000.md');
      const result = await handleToolCall('publish_note', { path: '20240101T120000--tool-note.org' });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toMatchObject({
          identifier: '20240101T120000',
          outputPath,
          message: `Published 20240101T120000--tool-note.org to ${outputPath}`,
        });
      }
      expect(await readFile(outputPath, 'utf-8')).toContain('Hello.\n');
    });

    it('reports missing notes', async () => {
      const result = await handleToolCall('publish_note', { path: 'missing.org' });
      expect(result).toEqual({ success: false, error: 'Note not found: missing.org', code: 'NOTE_NOT_FOUND' });
    });
  });

  describe('publish_all', () => {
    it('summarizes the run', async () => {
      const result = await handleToolCall('publish_all', { output_dir: 'out' });
      const outputDir = join(root, 'site', 'out');

      expect(result).toEqual({
        success: true,
        data: {
          outputDir,
          published: [{ source: '20240101T120000--tool-note.org', outputPath: join(outputDir, '20240101T120000.md') }],
          failed: [],
          message: `Published 1 note to ${outputDir}`,
        },
      });
    });
  });
});

import { describe, it, expect } from 'vitest';
import { parse as parseYaml } from 'yaml';
import {
  atom,
  classifyField,
  lookupOption,
  normalizeOptionKey,
  renderField,
  resolveField,
  synthesizeFrontMatter,
} from '../../../../src/services/frontmatter/index.js';
import { InvalidListElementError, MalformedScalarError } from '../../../../src/utils/errors.js';
import { makeEnvironment } from '../../../helpers/environment.js';

const NOW = new Date(2026, 9, 18, 8, 0, 0);

describe('classifyField', () => {
  it('maps known names to their kinds', () => {
    expect(classifyField('title')).toEqual({ kind: 'title' });
    expect(classifyField('last_updated_at')).toEqual({ kind: 'last_updated_at' });
    expect(classifyField('category')).toEqual({ kind: 'category' });
  });

  it('maps everything else to an option lookup', () => {
    expect(classifyField('description')).toEqual({ kind: 'option', name: 'description' });
    expect(classifyField('Title')).toEqual({ kind: 'option', name: 'Title' });
  });
});

describe('option lookup', () => {
  it('normalizes case and separators', () => {
    expect(normalizeOptionKey('hugo_draft')).toBe('HUGO-DRAFT');
    expect(normalizeOptionKey('Hugo-Draft')).toBe('HUGO-DRAFT');
  });

  it('finds values regardless of key convention', () => {
    const options = new Map<string, unknown>([['HUGO-DRAFT', 'true'], ['description', 'x']]);
    expect(lookupOption(options, 'hugo_draft')).toBe('true');
    expect(lookupOption(options, 'DESCRIPTION')).toBe('x');
    expect(lookupOption(options, 'missing')).toBeUndefined();
  });
});

describe('resolveField', () => {
  it('formats the creation date', () => {
    const env = makeEnvironment({ created: new Date(2024, 0, 4, 9, 30) });
    expect(resolveField({ kind: 'date' }, env, NOW)).toBe('"2024-01-04"');
  });

  it('uses publish time for last_updated_at', () => {
    const env = makeEnvironment({ created: new Date(2024, 0, 4), options: { last_updated_at: '2020-01-01' } });
    expect(resolveField({ kind: 'last_updated_at' }, env, NOW)).toBe('"2026-10-18"');
  });

  it('splits aliases on whitespace', () => {
    const env = makeEnvironment({ aliases: '  first\tsecond  third ' });
    expect(resolveField({ kind: 'aliases' }, env, NOW)).toEqual(['first', 'second', 'third']);
  });

  it('leaves missing aliases absent', () => {
    expect(resolveField({ kind: 'aliases' }, makeEnvironment(), NOW)).toBeUndefined();
  });

  it('reads category only from the explicit annotation', () => {
    const env = makeEnvironment({ options: { CATEGORY: 'from-options', FILENAME: 'journal' } });
    expect(resolveField({ kind: 'category' }, env, NOW)).toBeUndefined();
    expect(resolveField({ kind: 'category' }, makeEnvironment({ category: 'essays' }), NOW)).toBe('essays');
  });
});

describe('synthesizeFrontMatter', () => {
  it('emits configured fields in order between separators', () => {
    const env = makeEnvironment({
      title: 'My Note Title',
      created: new Date(2024, 0, 4),
      tags: ['emacs', 'org-mode'],
    });

    expect(synthesizeFrontMatter(['title', 'date', 'tags'], env, { now: NOW })).toBe(
      '---\ntitle: "My Note Title"\ndate: "2024-01-04"\ntags: ["emacs", "org-mode"]\n---\n'
    );
  });

  it('omits an empty tag sequence', () => {
    const env = makeEnvironment({ title: 'Hi', created: new Date(2024, 0, 4), tags: [] });
    expect(synthesizeFrontMatter(['title', 'date', 'tags'], env, { now: NOW })).toBe(
      '---\ntitle: "Hi"\ndate: "2024-01-04"\n---\n'
    );
  });

  it('omits absent and empty-string fields but keeps the rest in order', () => {
    const env = makeEnvironment({
      title: '',
      tags: ['x'],
      options: { description: 'About', subtitle: '' },
    });

    expect(
      synthesizeFrontMatter(['title', 'subtitle', 'description', 'category', 'tags', 'aliases'], env, { now: NOW })
    ).toBe('---\ndescription: "About"\ntags: ["x"]\n---\n');
  });

  it('keeps duplicate descriptors', () => {
    const env = makeEnvironment({ title: 'Twice' });
    expect(synthesizeFrontMatter(['title', 'title'], env, { now: NOW })).toBe(
      '---\ntitle: "Twice"\ntitle: "Twice"\n---\n'
    );
  });

  it('renders last_updated_at from the publish time', () => {
    expect(synthesizeFrontMatter(['last_updated_at'], makeEnvironment(), { now: NOW })).toBe(
      '---\nlast_updated_at: "2026-10-18"\n---\n'
    );
  });

  it('renders option-table values with the scalar rules', () => {
    const env = makeEnvironment({
      options: { 'HUGO-DRAFT': 'true', weight: 10, layout: atom('post'), keywords: ['a', 'b'] },
    });

    expect(synthesizeFrontMatter(['hugo_draft', 'weight', 'layout', 'keywords'], env, { now: NOW })).toBe(
      '---\nhugo_draft: true\nweight: 10\nlayout: "post"\nkeywords: ["a", "b"]\n---\n'
    );
  });

  it('renders an empty block when nothing survives', () => {
    expect(synthesizeFrontMatter(['title', 'category'], makeEnvironment(), { now: NOW })).toBe('---\n---\n');
  });

  it('fails the whole block on an invalid list element', () => {
    const env = makeEnvironment({ title: 'Fine', tags: ['ok', ''] });
    expect(() => synthesizeFrontMatter(['title', 'tags'], env, { now: NOW })).toThrow(InvalidListElementError);
  });

  it('fails on malformed scalars unless lenient', () => {
    const env = makeEnvironment({ options: { extra: { nested: true } } });
    expect(() => synthesizeFrontMatter(['extra'], env, { now: NOW })).toThrow(MalformedScalarError);
    expect(synthesizeFrontMatter(['extra'], env, { now: NOW, lenient: true })).toBe('---\nextra: ""\n---\n');
  });

  it('produces YAML that parses back to the metadata', () => {
    const env = makeEnvironment({
      title: 'Quotes "and" \\ slashes',
      aliases: 'one two',
      tags: ['a b', 'c'],
      category: 'notes',
    });

    const block = synthesizeFrontMatter(['title', 'aliases', 'tags', 'category'], env, { now: NOW });
    const yaml = block.replace(/^---\n/, '').replace(/---\n$/, '');

    expect(parseYaml(yaml)).toEqual({
      title: 'Quotes "and" \\ slashes',
      aliases: ['one', 'two'],
      tags: ['a b', 'c'],
      category: 'notes',
    });
  });
});

describe('renderField', () => {
  it('returns null for omitted fields', () => {
    expect(renderField('category', makeEnvironment())).toBeNull();
  });

  it('returns the key: value line', () => {
    expect(renderField('title', makeEnvironment({ title: 'X' }))).toBe('title: "X"');
  });
});

import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { rewriteFragmentFile, rewriteFragmentText } from '../rewriter/fragment-rewriter';
import { LoggerFactory } from '../utils/logger';
import { makeTempDir, readFixture, removeDir } from './helpers';

describe('rewriteFragmentText', () => {
  it('strips the wrapper and nests materials under the content prim', () => {
    const result = rewriteFragmentText(readFixture('chair-fragment.usda'));

    expect(result.text).toBe(readFixture('chair-fragment.stripped.usda'));
    expect(result.changed).toBe(true);
    expect(result.defaultPrim).toBe('Chair');
    expect(result.warnings).toEqual([]);
  });

  it('changes nothing on its own output', () => {
    const once = rewriteFragmentText(readFixture('chair-fragment.usda'));
    const twice = rewriteFragmentText(once.text);

    expect(twice.changed).toBe(false);
    expect(twice.text).toBe(once.text);
    expect(twice.warnings).toEqual([]);
    expect(twice.defaultPrim).toBe('Chair');
  });

  it('lifts material scopes to the layer root when nesting is off', () => {
    const result = rewriteFragmentText(readFixture('chair-fragment.usda'), { nestMaterials: false });

    expect(result.text).toContain('rel material:binding = </mtl/Wood>');
    expect(result.text).toContain('\ndef Scope "mtl"\n');
    expect(result.defaultPrim).toBe('Chair');
  });

  it('keeps the wrapper and only nests materials when stripping is off', () => {
    const result = rewriteFragmentText(readFixture('chair-fragment.usda'), { stripRoot: false });

    expect(result.changed).toBe(true);
    expect(result.defaultPrim).toBe('root');
    expect(result.text).toContain('        rel material:binding = </root/Chair/mtl/Wood>\n');
    expect(result.text).toContain('        def Scope "mtl"\n');

    const again = rewriteFragmentText(result.text, { stripRoot: false });
    expect(again.changed).toBe(false);
  });

  it('does not nest materials shared by several content prims', () => {
    const text = [
      '#usda 1.0',
      '',
      'def Xform "root"',
      '{',
      '    def Xform "Chair"',
      '    {',
      '        rel material:binding = </root/Looks/Red>',
      '    }',
      '',
      '    def Xform "Table"',
      '    {',
      '    }',
      '',
      '    def Scope "Looks"',
      '    {',
      '    }',
      '}',
      '',
    ].join('\n');

    const result = rewriteFragmentText(text);
    expect(result.text).toContain('rel material:binding = </Looks/Red>');
    expect(result.defaultPrim).toBe('Chair');
  });

  it('ignores class prims when picking the content prim', () => {
    const text = [
      '#usda 1.0',
      '',
      'def Xform "root"',
      '{',
      '    class Xform "_class_Chair"',
      '    {',
      '    }',
      '',
      '    def Xform "Chair"',
      '    {',
      '    }',
      '',
      '    def Scope "mtl"',
      '    {',
      '    }',
      '}',
      '',
    ].join('\n');

    const result = rewriteFragmentText(text);
    expect(result.defaultPrim).toBe('Chair');
    expect(result.text).toContain('    def Scope "mtl"\n');
  });

  it('collapses directly nested wrappers', () => {
    const text = [
      '#usda 1.0',
      '',
      'def Xform "root"',
      '{',
      '    def Xform "root"',
      '    {',
      '        def Mesh "Box"',
      '        {',
      '            rel material:binding = </root/root/Looks/Red>',
      '        }',
      '',
      '        def Scope "Looks"',
      '        {',
      '            def Material "Red"',
      '            {',
      '            }',
      '        }',
      '    }',
      '}',
      '',
    ].join('\n');

    expect(rewriteFragmentText(text).text).toBe([
      '#usda 1.0',
      '(',
      '    defaultPrim = "Box"',
      ')',
      '',
      'def Mesh "Box"',
      '{',
      '    rel material:binding = </Box/Looks/Red>',
      '',
      '    def Scope "Looks"',
      '    {',
      '        def Material "Red"',
      '        {',
      '        }',
      '    }',
      '}',
      '',
    ].join('\n'));
  });

  it('flattens the scene wrapper inside a SkelRoot', () => {
    const result = rewriteFragmentText(readFixture('skel-fragment.usda'));

    expect(result.text).toBe(readFixture('skel-fragment.flattened.usda'));
    expect(result.defaultPrim).toBe('root');
    expect(rewriteFragmentText(result.text).changed).toBe(false);
  });

  describe('variant siblings', () => {
    const teapotSet = [
      '#usda 1.0',
      '',
      'def Xform "root"',
      '{',
      '    def Xform "Teapot_set"',
      '    {',
      '        def Mesh "Teapot_VARIANT2"',
      '        {',
      '        }',
      '',
      '        def Mesh "Teapot_VARIANT1"',
      '        {',
      '            rel proxyPrim = </root/Teapot_set/Teapot_VARIANT1>',
      '        }',
      '    }',
      '}',
      '',
    ].join('\n');

    it('folds them into a variant set on their parent', () => {
      const result = rewriteFragmentText(teapotSet);

      expect(result.changed).toBe(true);
      expect(result.defaultPrim).toBe('Teapot_set');
      expect(result.text).toBe([
        '#usda 1.0',
        '(',
        '    defaultPrim = "Teapot_set"',
        ')',
        '',
        'def Xform "Teapot_set" (',
        '    variants = {',
        '        string modelVariant = "1"',
        '    }',
        '    prepend variantSets = "modelVariant"',
        ')',
        '{',
        '    variantSet "modelVariant" = {',
        '        "1" {',
        '            def Mesh "Teapot"',
        '            {',
        '                rel proxyPrim = </Teapot_set/Teapot>',
        '            }',
        '        }',
        '        "2" {',
        '            def Mesh "Teapot"',
        '            {',
        '            }',
        '        }',
        '    }',
        '}',
        '',
      ].join('\n'));
    });

    it('changes nothing once folded', () => {
      const once = rewriteFragmentText(teapotSet);
      const twice = rewriteFragmentText(once.text);

      expect(twice.changed).toBe(false);
      expect(twice.text).toBe(once.text);
      expect(twice.defaultPrim).toBe('Teapot_set');
    });

    it('uses the configured variant set name', () => {
      const result = rewriteFragmentText(teapotSet, { variantSetName: 'look' });
      expect(result.text).toContain('    prepend variantSets = "look"\n');
      expect(result.text).toContain('    variantSet "look" = {\n');
    });

    it('leaves a lone variant child in place', () => {
      const result = rewriteFragmentText(
        '#usda 1.0\n\ndef Xform "root"\n{\n    def Xform "Set"\n    {\n        def Mesh "Cup_VARIANT1"\n        {\n        }\n    }\n}\n'
      );
      expect(result.text).toBe(
        '#usda 1.0\n(\n    defaultPrim = "Set"\n)\n\ndef Xform "Set"\n{\n    def Mesh "Cup_VARIANT1"\n    {\n    }\n}\n'
      );
    });
  });

  it('prefixes the content root onto joint tokens naming its prims', () => {
    const text = [
      '#usda 1.0',
      '',
      'def Xform "root"',
      '{',
      '    def Xform "Puppet"',
      '    {',
      '        def Skeleton "Skel"',
      '        {',
      '            uniform token[] joints = ["Skel", "root/Puppet/Skel", "Hips"]',
      '        }',
      '    }',
      '}',
      '',
    ].join('\n');

    expect(rewriteFragmentText(text).text)
      .toContain('        uniform token[] joints = ["Puppet/Skel", "Puppet/Skel", "Hips"]\n');
  });

  describe('shape mismatches', () => {
    const expectMismatch = (text: string, reason: string): void => {
      const result = rewriteFragmentText(text, {}, 'Chair.usda');
      expect(result.changed).toBe(false);
      expect(result.text).toBe(text);
      expect(result.warnings).toEqual([{
        kind: 'WrapperShapeMismatch',
        subject: 'Chair.usda',
        message: `Left unchanged: ${reason}`,
      }]);
    };

    it('reports a layer without the wrapper', () => {
      expectMismatch('#usda 1.0\n\ndef Xform "Chair"\n{\n}\n', 'no /root wrapper');
    });

    it('reports an empty wrapper', () => {
      expectMismatch('#usda 1.0\n\ndef Xform "root"\n{\n}\n', 'the wrapper is empty');
    });

    it('reports a wrapper holding only materials', () => {
      expectMismatch(
        '#usda 1.0\n\ndef Xform "root"\n{\n    def Scope "mtl"\n    {\n    }\n}\n',
        'the wrapper holds only material scopes'
      );
    });

    it('reports a name collision at the layer root', () => {
      expectMismatch(
        '#usda 1.0\n\ndef Xform "Chair"\n{\n}\n\ndef Xform "root"\n{\n    def Xform "Chair"\n    {\n    }\n}\n',
        "moving 'Chair' to the layer root would replace an existing prim"
      );
    });

    it('reports text it cannot parse', () => {
      expectMismatch('not a layer', "Missing '#usda' header (line 1)");
    });
  });
});

describe('rewriteFragmentFile', () => {
  let dir: string;
  const logger = LoggerFactory.forQuiet();

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('rewrites the file in place', async () => {
    const filePath = path.join(dir, 'Chair.usda');
    fs.writeFileSync(filePath, readFixture('chair-fragment.usda'));

    const result = await rewriteFragmentFile(filePath, { logger });

    expect(result).toEqual({ filePath, changed: true, warnings: [], defaultPrim: 'Chair' });
    expect(fs.readFileSync(filePath, 'utf8')).toBe(readFixture('chair-fragment.stripped.usda'));
    expect(fs.readdirSync(dir)).toEqual(['Chair.usda']);
  });

  it('leaves binary layers alone', async () => {
    const filePath = path.join(dir, 'Chair.usdc');
    const bytes = Buffer.concat([Buffer.from('PXR-USDC', 'latin1'), Buffer.alloc(16)]);
    fs.writeFileSync(filePath, bytes);

    const result = await rewriteFragmentFile(filePath, { logger });

    expect(result.changed).toBe(false);
    expect(result.warnings.map(warning => warning.kind)).toEqual(['UnsupportedFragmentFormat']);
    expect(fs.readFileSync(filePath).equals(bytes)).toBe(true);
  });

  it('fails on a missing file', async () => {
    await expect(rewriteFragmentFile(path.join(dir, 'Ghost.usda'), { logger }))
      .rejects.toMatchObject({ _tag: 'UsdFileSystemError', operation: 'read' });
  });
});

import { describe, it, expect } from 'vitest';
import { UsdAssetPath, UsdNode } from '../core/usd-node';
import { UsdSchemaError } from '../errors';
import { formatUsdAssetPath, formatUsdFloat } from '../utils/usd-formatter';
import { captureError } from './helpers';

describe('UsdNode', () => {
  it('rejects invalid prim paths', () => {
    expect(captureError(() => new UsdNode('World', 'Xform'))).toBeInstanceOf(UsdSchemaError);
    expect(captureError(() => new UsdNode('/World/my prim', 'Xform'))).toBeInstanceOf(UsdSchemaError);
  });

  it('writes a prim without metadata as a bare definition', () => {
    const node = new UsdNode('/World', 'Xform');
    node.createChild('Props', 'Scope');

    expect(node.serializeToUsda(0, true)).toBe([
      'def Xform "World"',
      '{',
      '    def Scope "Props"',
      '    {',
      '    }',
      '}',
      '',
    ].join('\n'));
    expect(node.getChild('Props')?.getPath()).toBe('/World/Props');
    expect(node.countPrims()).toBe(2);
  });

  it('replaces attributes and metadata set twice', () => {
    const node = new UsdNode('/Chair', 'Xform');
    node.setMetadata('kind', 'component').setMetadata('kind', 'group');
    node.setAttribute('uniform token purpose', 'render').setAttribute('uniform token purpose', 'proxy');

    expect(node.getMetadata('kind')).toBe('group');
    expect(node.getAttribute('uniform token purpose')).toBe('proxy');
    expect(node.serializeToUsda(0, true)).toBe([
      'def Xform "Chair" (',
      '    kind = "group"',
      ')',
      '{',
      '    uniform token purpose = "proxy"',
      '}',
      '',
    ].join('\n'));
  });

  it('separates attributes, variant sets and children with blank lines', () => {
    const node = new UsdNode('/Lamp', 'Xform');
    node.setAttribute('token visibility', 'invisible');
    node.variantSet('look').variant('on').setMetadata('prepend references', new UsdAssetPath('./on.usda'));
    node.createChild('Bulb', 'Xform');

    expect(node.serializeToUsda(0, true)).toBe([
      'def Xform "Lamp"',
      '{',
      '    token visibility = "invisible"',
      '',
      '    variantSet "look" = {',
      '        "on" (',
      '            prepend references = @./on.usda@',
      '        ) {',
      '        }',
      '    }',
      '',
      '    def Xform "Bulb"',
      '    {',
      '    }',
      '}',
      '',
    ].join('\n'));
  });
});

describe('usd formatter', () => {
  it('writes floats without trailing zeros', () => {
    expect(formatUsdFloat(0.01)).toBe('0.01');
    expect(formatUsdFloat(2)).toBe('2');
    expect(formatUsdFloat(1 / 3)).toBe('0.3333333');
  });

  it('uses the triple delimiter for paths containing @', () => {
    expect(formatUsdAssetPath('./Chair.usda')).toBe('@./Chair.usda@');
    expect(formatUsdAssetPath('./a@b.usda')).toBe('@@@./a@b.usda@@@');
  });
});

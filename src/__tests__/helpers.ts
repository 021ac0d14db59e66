import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { ContainerRecord, FragmentRecord, HierarchyNode, PropertyOverrides } from '../types';

export const EXPORT_DIR = '/export';

export function fragment(
  objectName: string,
  parentPath: string[] = [],
  propertyOverrides?: PropertyOverrides
): FragmentRecord {
  return {
    filePath: `${EXPORT_DIR}/${objectName}.usda`,
    objectName,
    parentPath,
    ...(propertyOverrides ? { propertyOverrides } : {}),
  };
}

export function container(objectName: string, parentPath: string[] = []): ContainerRecord {
  return { container: true, objectName, parentPath };
}

/**
 * Child of `node` by name; fails the test when it is missing
 */
export function childNamed(node: HierarchyNode, name: string): HierarchyNode {
  const child = node.children.find(candidate => candidate.name === name);
  if (!child) {
    throw new Error(`No child '${name}' under '${node.path}'`);
  }
  return child;
}

/**
 * Runs `fn` and returns what it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected an error to be thrown');
}

export async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'stage-assembler-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf8');
}

/**
 * Fragment text in the shape the native exporter writes
 */
export function wrappedFragment(content: string): string {
  return [
    '#usda 1.0',
    '(',
    '    defaultPrim = "root"',
    ')',
    '',
    'def Xform "root"',
    '{',
    `    def Mesh "${content}"`,
    '    {',
    '    }',
    '}',
    '',
  ].join('\n');
}

/**
 * Metadata Loader
 *
 * Collects the batch records for an export directory. Three sources are
 * tried in order: per-fragment sidecars, a `_hierarchy.txt` index, and
 * finally every fragment file placed at the root.
 */

import * as fs from 'fs';
import * as path from 'path';
import { FILE_EXTENSIONS, FILE_NAMES, FRAGMENT_EXTENSIONS } from '../constants/config';
import { ERROR_MESSAGES } from '../constants/errors';
import { UsdErrorFactory } from '../errors';
import { FragmentSidecarSchema } from '../schemas';
import type { BatchRecord, ContainerRecord, FragmentRecord } from '../types';
import { findFiles, isDirectory, pathExists } from '../utils/file-utils';
import { Logger, LoggerFactory } from '../utils/logger';
import { getBasenameWithoutExt } from '../utils/name-utils';

export type BatchSource = 'sidecar' | 'hierarchy' | 'flat';

export interface LoadOptions {
  /** Name of the assembled document, never read as a fragment */
  outputFileName?: string;
  logger?: Logger;
}

export interface LoadedBatch {
  exportDir: string;
  source: BatchSource;
  records: BatchRecord[];
}

const HIERARCHY_DELIMITER = '|';

/**
 * Fragment files, excluding assembled stage documents
 */
export function isFragmentFileName(fileName: string, outputFileName?: string): boolean {
  if (fileName === outputFileName || fileName.endsWith(FILE_NAMES.STAGE_SUFFIX)) {
    return false;
  }
  return FRAGMENT_EXTENSIONS.some(ext => fileName.endsWith(ext));
}

function isSidecarFileName(fileName: string): boolean {
  return fileName.endsWith(FILE_EXTENSIONS.SIDECAR);
}

/**
 * Parse and validate one sidecar file
 */
export async function readSidecar(sidecarPath: string): Promise<BatchRecord> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(sidecarPath, 'utf8');
  } catch (error) {
    throw UsdErrorFactory.fileSystemError(
      `${ERROR_MESSAGES.UNREADABLE_SIDECAR}: ${sidecarPath}`,
      sidecarPath,
      'read',
      { cause: error instanceof Error ? error.message : String(error) }
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw UsdErrorFactory.schemaError(
      `${ERROR_MESSAGES.INVALID_SIDECAR}: ${error instanceof Error ? error.message : String(error)}`,
      sidecarPath
    );
  }

  const parsed = FragmentSidecarSchema.safeParse(json);
  if (!parsed.success) {
    throw UsdErrorFactory.validationError(ERROR_MESSAGES.INVALID_SIDECAR, sidecarPath, parsed.error);
  }
  const sidecar = parsed.data;

  if (sidecar.file === undefined) {
    const container: ContainerRecord = {
      container: true,
      objectName: sidecar.objectName,
      parentPath: sidecar.parentPath,
    };
    return container;
  }

  const filePath = path.resolve(path.dirname(sidecarPath), sidecar.file);
  if (!pathExists(filePath)) {
    throw UsdErrorFactory.fileSystemError(
      `${ERROR_MESSAGES.MISSING_FRAGMENT}: ${filePath}`,
      filePath,
      'read',
      { sidecarPath }
    );
  }

  const record: FragmentRecord = {
    filePath,
    objectName: sidecar.objectName,
    parentPath: sidecar.parentPath,
    ...(sidecar.properties !== undefined ? { propertyOverrides: sidecar.properties } : {}),
  };
  return record;
}

/**
 * Parse `name|parent` lines. Blank lines and `#` comments are ignored;
 * an empty parent marks a root-level object.
 */
export function parseHierarchyIndex(text: string): Map<string, string | undefined> {
  const parents = new Map<string, string | undefined>();
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    const [name, parent] = line.split(HIERARCHY_DELIMITER);
    if (name === undefined || parent === undefined || name.length === 0) continue;
    parents.set(name, parent.length > 0 ? parent : undefined);
  }
  return parents;
}

/**
 * Ancestor names of `name`, outermost first. A parent that is not itself
 * listed ends the chain; a chain that comes back to a name it has
 * already visited is an incomplete hierarchy.
 */
export function ancestorChain(name: string, parents: ReadonlyMap<string, string | undefined>): string[] {
  const chain: string[] = [];
  const seen = new Set<string>([name]);
  let parent = parents.get(name);

  while (parent !== undefined) {
    if (seen.has(parent)) {
      throw UsdErrorFactory.incompleteHierarchy(name, parent, chain);
    }
    seen.add(parent);
    chain.unshift(parent);
    parent = parents.get(parent);
  }
  return chain;
}

async function loadSidecars(sidecars: string[]): Promise<BatchRecord[]> {
  return Promise.all(sidecars.map(readSidecar));
}

function loadHierarchyIndex(
  parents: ReadonlyMap<string, string | undefined>,
  fragmentFiles: string[]
): BatchRecord[] {
  // First file wins per name, in extension lookup order
  const filesByName = new Map<string, string>();
  for (const ext of FRAGMENT_EXTENSIONS) {
    for (const file of fragmentFiles) {
      const name = getBasenameWithoutExt(file);
      if (file.endsWith(ext) && !filesByName.has(name)) {
        filesByName.set(name, file);
      }
    }
  }

  const records: BatchRecord[] = [];
  for (const name of parents.keys()) {
    const parentPath = ancestorChain(name, parents);
    const filePath = filesByName.get(name);
    if (filePath === undefined) {
      records.push({ container: true, objectName: name, parentPath });
    } else {
      records.push({ filePath, objectName: name, parentPath });
    }
  }
  return records;
}

export async function loadBatch(exportDir: string, options: LoadOptions = {}): Promise<LoadedBatch> {
  const logger = options.logger ?? LoggerFactory.forAssembly();
  const dir = path.resolve(exportDir);

  if (!isDirectory(dir)) {
    throw UsdErrorFactory.fileSystemError(`${ERROR_MESSAGES.INVALID_EXPORT_DIR}: ${dir}`, dir, 'read');
  }

  const sidecars = findFiles(dir, isSidecarFileName);
  if (sidecars.length > 0) {
    logger.info(`Reading ${sidecars.length} sidecar(s)`, { exportDir: dir });
    return { exportDir: dir, source: 'sidecar', records: await loadSidecars(sidecars) };
  }

  const fragmentFiles = findFiles(dir, fileName => isFragmentFileName(fileName, options.outputFileName));

  const indexPath = path.join(dir, FILE_NAMES.HIERARCHY_INDEX);
  if (pathExists(indexPath)) {
    const parents = parseHierarchyIndex(await fs.promises.readFile(indexPath, 'utf8'));
    logger.info(`Reading ${FILE_NAMES.HIERARCHY_INDEX}`, { exportDir: dir, entries: parents.size });
    return { exportDir: dir, source: 'hierarchy', records: loadHierarchyIndex(parents, fragmentFiles) };
  }

  logger.info(`No hierarchy metadata; placing ${fragmentFiles.length} fragment(s) at the root`, { exportDir: dir });
  const records: BatchRecord[] = fragmentFiles.map(filePath => ({
    filePath,
    objectName: getBasenameWithoutExt(filePath),
    parentPath: [],
  }));
  return { exportDir: dir, source: 'flat', records };
}

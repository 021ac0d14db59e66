/**
 * Stage Assembler
 *
 * Assembles one composition document out of per-object USD fragments.
 *
 * @example
 * ```typescript
 * import { defineAssembler } from 'usd-stage-assembler';
 *
 * const assembler = defineAssembler({
 *   defaultPrim: 'Set',
 *   metersPerUnit: 1
 * });
 *
 * const result = await assembler.assemble('./export/Kitchen');
 * console.log(result.outputPath, result.warnings);
 * ```
 */

import * as path from 'path';
import { ZodError } from 'zod';
import { FILE_NAMES } from './constants/config';
import { ERROR_MESSAGES } from './constants/errors';
import { isUsdError, UsdErrorFactory } from './errors';
import { StageAssemblerConfigSchema, type StageAssemblerConfig, type StageAssemblerOptions } from './schemas';
import type { AssemblyWarning, BatchRecord, HierarchyNode } from './types';
import { countFragments, isFragmentRecord, reconstructHierarchy } from './assembler/hierarchy-reconstructor';
import { emitStage } from './assembler/stage-emitter';
import { loadBatch, type BatchSource } from './assembler/metadata-loader';
import { rewriteFragmentFile } from './rewriter/fragment-rewriter';
import { writeFileAtomic } from './utils/file-utils';
import { Logger, LoggerFactory } from './utils/logger';
import { makeValidPrimName } from './utils/name-utils';

export interface StageAssemblerDeps {
  logger?: Logger;
}

export interface AssemblyResult {
  outputPath: string;
  document: string;
  tree: HierarchyNode;
  warnings: AssemblyWarning[];
  fragmentCount: number;
  primCount: number;
  source?: BatchSource;
}

/**
 * Main assembler class
 */
export class StageAssembler {
  private config: StageAssemblerConfig;
  private logger: Logger;

  constructor(config: StageAssemblerOptions = {}, deps: StageAssemblerDeps = {}) {
    try {
      this.config = StageAssemblerConfigSchema.parse(config);
    } catch (error) {
      if (error instanceof ZodError) {
        throw UsdErrorFactory.configError(
          ERROR_MESSAGES.INVALID_CONFIG,
          'StageAssemblerConfig',
          { zodError: error }
        );
      }
      throw error;
    }

    this.logger = deps.logger ?? (this.config.debug ? LoggerFactory.forDebug() : LoggerFactory.forAssembly());
    this.logger.logConfig({ ...this.config });
  }

  /**
   * Document path for an export directory
   */
  resolveOutputPath(exportDir: string): string {
    const dir = path.resolve(exportDir);
    const fileName = this.config.outputFileName ?? `${makeValidPrimName(path.basename(dir))}${FILE_NAMES.STAGE_SUFFIX}`;
    return path.join(dir, fileName);
  }

  /**
   * Load the batch metadata of an export directory and assemble it
   *
   * @param exportDir - Directory holding the fragments and their metadata
   */
  async assemble(exportDir: string): Promise<AssemblyResult> {
    const outputPath = this.resolveOutputPath(exportDir);
    try {
      const batch = await loadBatch(exportDir, {
        outputFileName: path.basename(outputPath),
        logger: this.logger,
      });
      const result = await this.assembleBatch(batch.records, outputPath);
      return { ...result, source: batch.source };
    } catch (error) {
      if (isUsdError(error)) {
        this.logger.logError(error, error.getDetails());
      }
      throw error;
    }
  }

  /**
   * Assemble already-loaded records into the document at `outputPath`.
   *
   * Hierarchy errors are thrown before any file is written; the document
   * is committed only after every fragment was rewritten and the tree
   * was emitted.
   */
  async assembleBatch(records: readonly BatchRecord[], outputPath: string): Promise<AssemblyResult> {
    return this.logger.withTiming('assemble', async () => {
      const fragments = records.filter(isFragmentRecord);
      if (fragments.length === 0) {
        throw UsdErrorFactory.assemblyError(ERROR_MESSAGES.EMPTY_BATCH, 'load', { outputPath });
      }

      this.logger.logAssemblyStage('reconstruct', { records: records.length });
      const { root, warnings } = reconstructHierarchy(records, {
        variantSetName: this.config.variantSetName,
      });

      this.logger.logAssemblyStage('rewrite', { fragments: fragments.length });
      const rewrites = await Promise.all(fragments.map(record =>
        rewriteFragmentFile(record.filePath, {
          stripRoot: this.config.stripRoot,
          nestMaterials: this.config.nestMaterials,
          variantSetName: this.config.variantSetName,
          logger: this.logger,
        })
      ));
      for (const rewrite of rewrites) {
        warnings.push(...rewrite.warnings);
      }

      this.logger.logAssemblyStage('emit');
      const emitted = emitStage(root, {
        documentDir: path.dirname(outputPath),
        defaultPrim: this.config.defaultPrim,
        relativePaths: this.config.relativePaths,
        upAxis: this.config.upAxis,
        metersPerUnit: this.config.metersPerUnit,
        ...(this.config.timeCodes ? { timeCodes: this.config.timeCodes } : {}),
      });
      warnings.push(...emitted.warnings);

      this.logger.logAssemblyStage('commit', { outputPath });
      await writeFileAtomic(outputPath, emitted.document);
      this.logger.logFileOperation('write', outputPath, Buffer.byteLength(emitted.document));

      for (const warning of warnings) {
        this.logger.warn(`${warning.kind}: ${warning.message}`, { subject: warning.subject });
      }

      return {
        outputPath,
        document: emitted.document,
        tree: root,
        warnings,
        fragmentCount: countFragments(root),
        primCount: emitted.primCount,
      };
    }, { outputPath });
  }

  /**
   * Get current configuration
   */
  getConfig(): StageAssemblerConfig {
    return { ...this.config };
  }
}

/**
 * Create an assembler with configuration
 *
 * @example
 * ```typescript
 * const assembler = defineAssembler({ stripRoot: false });
 * await assembler.assemble('./export/Props');
 * ```
 */
export function defineAssembler(config: StageAssemblerOptions = {}, deps: StageAssemblerDeps = {}): StageAssembler {
  return new StageAssembler(config, deps);
}

/**
 * TypeScript type exports
 */
export type {
  AssemblyWarning,
  BatchRecord,
  ContainerRecord,
  FragmentRecord,
  HierarchyNode,
  PropertySet,
  StageAssemblerConfig,
  StageAssemblerOptions,
  SuffixTags,
  VariantSetSpec
} from './types';

/**
 * Pipeline stage exports
 */
export { resolveSuffixes, composeSuffixedName } from './assembler/suffix-resolver';
export { mergeProperties, resolveGeomType, DEFAULT_PROPERTIES } from './assembler/property-merger';
export { reconstructHierarchy, countFragments } from './assembler/hierarchy-reconstructor';
export { emitStage } from './assembler/stage-emitter';
export { loadBatch } from './assembler/metadata-loader';
export { rewriteFragmentText, rewriteFragmentFile } from './rewriter/fragment-rewriter';
export { parseUsdaOutline, serializeUsdaOutline } from './rewriter/usda-outline';
export { remapSdfPath } from './rewriter/path-remapper';
export * from './errors';

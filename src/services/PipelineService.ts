/**
 * End-to-end run: observations → contexts → resolved taxa → induced
 * subtree → annotated figures. Stages run one after another; losses inside
 * a stage are absorbed, a stage with no usable output stops the run.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { DEFAULTS } from '../config.js';
import { ServiceUnavailableError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ITreeRenderer } from '../providers/ITreeRenderer.js';
import { tagRecords } from '../taxonomy/contexts.js';
import type { ObservationQuery, RenderedFigure } from '../types/models.js';
import type { AnnotationResult, AnnotationService } from './AnnotationService.js';
import type { NameResolutionService, ResolutionResult } from './NameResolutionService.js';
import type { ObservationRetriever, RetrievalResult } from './ObservationRetriever.js';
import type { SubtreeResult, SubtreeService } from './SubtreeService.js';

export interface FigureOutput {
  format: RenderedFigure['format'];
  file: string;
  bytes: number;
}

export interface PipelineResult {
  retrieval: RetrievalResult;
  resolution: ResolutionResult;
  subtree: SubtreeResult;
  annotation: AnnotationResult;
  figures: FigureOutput[];
}

export interface PipelineOutputOptions {
  outDir?: string;
  name?: string;
}

export class PipelineService {
  private readonly outDir: string;
  private readonly name: string;

  constructor(
    private readonly retriever: ObservationRetriever,
    private readonly resolution: NameResolutionService,
    private readonly subtrees: SubtreeService,
    private readonly annotations: AnnotationService,
    private readonly renderers: readonly ITreeRenderer[],
    private readonly logger: ILogProvider,
    output?: PipelineOutputOptions
  ) {
    this.outDir = output?.outDir ?? DEFAULTS.render.outDir;
    this.name = output?.name ?? DEFAULTS.render.name;
  }

  async run(query: ObservationQuery): Promise<PipelineResult> {
    const retrieval = await this.retriever.fetchAll(query);
    if (retrieval.records.length === 0) {
      throw new ServiceUnavailableError('iNaturalist', 'no identified observations were returned');
    }

    const tagged = tagRecords(retrieval.records);
    const resolution = await this.resolution.resolve(tagged);
    if (resolution.taxa.length === 0) {
      throw new ServiceUnavailableError('Open Tree TNRS', 'no observed name could be resolved', {
        requested: resolution.requested,
      });
    }

    const subtree = await this.subtrees.extract(resolution.taxa);
    const annotation = this.annotations.annotate(subtree.tree);

    const figures: FigureOutput[] = [];
    if (this.renderers.length > 0) {
      await mkdir(this.outDir, { recursive: true });
    }
    for (const renderer of this.renderers) {
      const figure = await renderer.render(subtree.tree, annotation.annotation);
      const file = join(this.outDir, `${this.name}.${figure.format}`);
      await writeFile(file, figure.data);
      figures.push({ format: figure.format, file, bytes: figure.data.length });
    }

    this.logger.info('Pipeline finished', {
      observations: retrieval.records.length,
      resolved: resolution.taxa.length,
      tips: subtree.tree.tipCount,
      figures: figures.map((f) => f.file),
    });

    return { retrieval, resolution, subtree, annotation, figures };
  }
}

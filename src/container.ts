/**
 * Dependency wiring.
 * Builds every service from provider interfaces; tests pass in-memory
 * providers, container.production.ts passes the HTTP ones.
 */

import type { PipelineConfig } from './config.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { INameResolver } from './providers/INameResolver.js';
import type { IObservationProvider } from './providers/IObservationProvider.js';
import type { ISubtreeProvider } from './providers/ISubtreeProvider.js';
import type { ITreeRenderer } from './providers/ITreeRenderer.js';
import { AnnotationService } from './services/AnnotationService.js';
import { NameResolutionService } from './services/NameResolutionService.js';
import { ObservationRetriever } from './services/ObservationRetriever.js';
import { PipelineService } from './services/PipelineService.js';
import { SubtreeService } from './services/SubtreeService.js';
import type { Sleep } from './services/Throttle.js';

export interface Container {
  retriever: ObservationRetriever;
  nameResolutionService: NameResolutionService;
  subtreeService: SubtreeService;
  annotationService: AnnotationService;
  pipeline: PipelineService;
  logProvider: ILogProvider;
}

export function createContainer(deps: {
  config: PipelineConfig;
  observationProvider: IObservationProvider;
  nameResolver: INameResolver;
  subtreeProvider: ISubtreeProvider;
  renderers: ITreeRenderer[];
  logProvider: ILogProvider;
  sleep?: Sleep;
}): Container {
  const { config, logProvider } = deps;

  const retriever = new ObservationRetriever(deps.observationProvider, logProvider, {
    perPage: config.retrieval.perPage,
    maxRequests: config.retrieval.maxRequests,
    requestsPerSecond: config.retrieval.requestsPerSecond,
    maxRetries: config.retrieval.maxRetries,
    retryBackoffMs: config.retrieval.retryBackoffMs,
    pageFailure: config.retrieval.pageFailure,
    strict: config.retrieval.strict,
    ...(deps.sleep && { sleep: deps.sleep }),
  });
  const nameResolutionService = new NameResolutionService(deps.nameResolver, logProvider, {
    minScore: config.resolution.minScore,
    chunkSize: config.resolution.chunkSize,
  });
  const subtreeService = new SubtreeService(deps.subtreeProvider, logProvider, {
    labelFormat: config.subtree.labelFormat,
    treeFile: config.subtree.treeFile,
    collapseSingles: config.subtree.collapseSingles,
  });
  const annotationService = new AnnotationService(logProvider, {
    highlights: config.render.highlights,
    images: config.render.images,
    showTipLabels: config.render.showTipLabels,
    stripOttIds: config.render.stripOttIds,
  });
  const pipeline = new PipelineService(
    retriever,
    nameResolutionService,
    subtreeService,
    annotationService,
    deps.renderers,
    logProvider,
    { outDir: config.render.outDir, name: config.render.name }
  );

  return {
    retriever,
    nameResolutionService,
    subtreeService,
    annotationService,
    pipeline,
    logProvider,
  };
}

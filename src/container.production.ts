/**
 * Production container — real iNaturalist and Open Tree clients, SVG/PNG
 * renderers. Renderers are built from `config.render.formats`.
 */

import type { PipelineConfig } from './config.js';
import { createContainer, type Container } from './container.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { ITreeRenderer } from './providers/ITreeRenderer.js';
import { INaturalistObservationProvider } from './providers/INaturalistObservationProvider.js';
import { OpenTreeNameResolver } from './providers/OpenTreeNameResolver.js';
import { OpenTreeSubtreeProvider } from './providers/OpenTreeSubtreeProvider.js';
import { PngTreeRenderer } from './providers/PngTreeRenderer.js';
import { SvgTreeRenderer } from './providers/SvgTreeRenderer.js';

export const USER_AGENT = 'inat-phylotree/0.1 (batch tree builder)';

export function createProductionContainer(config: PipelineConfig, logProvider: ILogProvider): Container {
  const svg = new SvgTreeRenderer({ size: config.render.size });
  const renderers: ITreeRenderer[] = config.render.formats.map((format) =>
    format === 'svg' ? svg : new PngTreeRenderer(svg)
  );

  return createContainer({
    config,
    observationProvider: new INaturalistObservationProvider({
      baseUrl: config.retrieval.baseUrl,
      timeoutMs: config.retrieval.timeoutMs,
      userAgent: USER_AGENT,
    }),
    nameResolver: new OpenTreeNameResolver({
      baseUrl: config.resolution.baseUrl,
      timeoutMs: config.resolution.timeoutMs,
    }),
    subtreeProvider: new OpenTreeSubtreeProvider({
      baseUrl: config.subtree.baseUrl,
      timeoutMs: config.subtree.timeoutMs,
    }),
    renderers,
    logProvider,
  });
}

/**
 * Open Tree of Life synthetic tree (POST /v3/tree_of_life/induced_subtree).
 */

import { DEFAULTS } from '../config.js';
import { InducedSubtreeResponseSchema } from '../types/api.js';
import type { LabelFormat } from '../types/models.js';
import type { InducedSubtree, ISubtreeProvider } from './ISubtreeProvider.js';
import { requestJson } from './http.js';

const SERVICE = 'Open Tree synthetic tree';

export class OpenTreeSubtreeProvider implements ISubtreeProvider {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(opts?: { baseUrl?: string; timeoutMs?: number }) {
    this.baseUrl = (opts?.baseUrl ?? DEFAULTS.subtree.baseUrl).replace(/\/+$/, '');
    this.timeoutMs = opts?.timeoutMs ?? DEFAULTS.subtree.timeoutMs;
  }

  async inducedSubtree(ottIds: number[], labelFormat: LabelFormat): Promise<InducedSubtree> {
    const { data } = await requestJson(
      {
        service: SERVICE,
        url: `${this.baseUrl}/tree_of_life/induced_subtree`,
        method: 'POST',
        body: { ott_ids: ottIds, label_format: labelFormat },
        timeoutMs: this.timeoutMs,
      },
      InducedSubtreeResponseSchema
    );
    return { newick: data.newick, broken: data.broken ?? {} };
  }
}

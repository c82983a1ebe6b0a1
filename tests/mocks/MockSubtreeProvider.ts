import type { InducedSubtree, ISubtreeProvider } from '../../src/providers/ISubtreeProvider.js';
import type { LabelFormat } from '../../src/types/models.js';

/** Returns a fixed subtree (a bare Newick string has no broken taxa), or throws when given an Error. */
export class MockSubtreeProvider implements ISubtreeProvider {
  readonly calls: Array<{ ottIds: number[]; labelFormat: LabelFormat }> = [];

  constructor(private readonly response: string | InducedSubtree | Error) {}

  async inducedSubtree(ottIds: number[], labelFormat: LabelFormat): Promise<InducedSubtree> {
    this.calls.push({ ottIds: [...ottIds], labelFormat });
    if (this.response instanceof Error) throw this.response;
    if (typeof this.response === 'string') return { newick: this.response, broken: {} };
    return this.response;
  }
}

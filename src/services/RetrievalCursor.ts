/**
 * Paging state machine for one retrieval.
 *
 *   AwaitingFirstPage ──ok──▶ Paging(next, total) ──▶ … ──▶ Exhausted
 *          │                        │
 *          └──fail──▶ Exhausted     └──request budget spent──▶ CappedOut
 *
 * The page count comes from the first successful response; a failed first
 * page leaves it unknown, so nothing further is requested.
 */

export type RetrievalState =
  | { kind: 'AwaitingFirstPage' }
  | { kind: 'Paging'; nextPage: number; totalPages: number }
  | { kind: 'Exhausted' }
  | { kind: 'CappedOut'; nextPage: number; totalPages: number };

export type RetrievalStateKind = RetrievalState['kind'];

export class RetrievalCursor {
  private current: RetrievalState = { kind: 'AwaitingFirstPage' };
  private issued = 0;

  constructor(private readonly maxRequests: number) {}

  get state(): RetrievalState {
    return this.current;
  }

  /** Requests issued so far, retries included. */
  get requests(): number {
    return this.issued;
  }

  /** Page to request next, or null once retrieval is over. */
  nextPage(): number | null {
    switch (this.current.kind) {
      case 'AwaitingFirstPage':
        return this.canRequest() ? 1 : null;
      case 'Paging':
        return this.current.nextPage;
      case 'Exhausted':
      case 'CappedOut':
        return null;
    }
  }

  canRequest(): boolean {
    return this.issued < this.maxRequests;
  }

  beginRequest(): void {
    this.issued++;
  }

  pageSucceeded(page: number, totalResults: number, perPage: number): void {
    const totalPages =
      this.current.kind === 'Paging' ? this.current.totalPages : Math.ceil(totalResults / perPage);
    this.moveTo(page + 1, totalPages);
  }

  pageFailed(page: number): void {
    if (this.current.kind !== 'Paging') {
      this.current = { kind: 'Exhausted' };
      return;
    }
    this.moveTo(page + 1, this.current.totalPages);
  }

  private moveTo(nextPage: number, totalPages: number): void {
    if (nextPage > totalPages) {
      this.current = { kind: 'Exhausted' };
    } else if (!this.canRequest()) {
      this.current = { kind: 'CappedOut', nextPage, totalPages };
    } else {
      this.current = { kind: 'Paging', nextPage, totalPages };
    }
  }
}

import type { FixRequestStatus, PositionSample } from '@/types';
import type { DeadlineHandle } from './deadlines';
import { DuplicateRequestIdError, type PositionError } from './errors';

/** Outcome delivered to a request's result sink */
export type FixResult =
  | { ok: true; sample: PositionSample }
  | { ok: false; error: PositionError };

export type FixResultSink = (result: FixResult) => void;

/** One pending one-shot fix */
export interface FixRequest {
  readonly id: string;
  readonly desiredAccuracy: number;
  readonly deadline: number;          // epoch ms
  status: FixRequestStatus;
  readonly resultSink: FixResultSink;
  deadlineHandle: DeadlineHandle | null;
}

/**
 * Set of pending one-shot requests keyed by id.
 * Pure storage: never touches timers or the provider.
 */
export class RequestRegistry {
  private readonly requests = new Map<string, FixRequest>();

  add(request: FixRequest): void {
    if (this.requests.has(request.id)) {
      throw new DuplicateRequestIdError(request.id);
    }
    this.requests.set(request.id, request);
  }

  remove(id: string): void {
    this.requests.delete(id);
  }

  get(id: string): FixRequest | undefined {
    return this.requests.get(id);
  }

  /** Snapshot of the pending set; later mutations do not show up in it */
  allPending(): FixRequest[] {
    return [...this.requests.values()];
  }

  isEmpty(): boolean {
    return this.requests.size === 0;
  }

  get size(): number {
    return this.requests.size;
  }
}

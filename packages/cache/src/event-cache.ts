import { EventEmitter } from "node:events";
import { createLogger } from "@beaconkit/logger";
import type {
  EventCacheEvents,
  EventCacheOptions,
  EventFragment,
  EventRecord,
  EvictionReason,
} from "./types.js";

const log = createLogger("cache:event-cache");

interface CacheEntry {
  pending: EventRecord[];
  inFlight: EventRecord[];
  pendingBytes: number;
  inFlightBytes: number;
}

/**
 * Per-session store of serialized event fragments.
 *
 * Each session's records move through two stages:
 * pending → in-flight on {@link drain}, in-flight → removed on
 * {@link confirmSent}, or in-flight → head of pending on {@link requeue}.
 *
 * Every method runs to completion synchronously, so callers on the event
 * loop and the dispatch loop never observe a half-applied update. Memory is
 * bounded by watermark eviction that only ever touches pending records.
 */
export class EventCache extends EventEmitter<EventCacheEvents> {
  private readonly entries = new Map<number, CacheEntry>();
  private readonly upperBoundary: number;
  private readonly lowerBoundary: number;
  private nextOrder = 0;
  private total = 0;

  constructor(options: EventCacheOptions) {
    super();
    if (options.lowerMemoryBoundaryBytes > options.upperMemoryBoundaryBytes) {
      throw new RangeError(
        `lowerMemoryBoundaryBytes (${options.lowerMemoryBoundaryBytes}) exceeds upperMemoryBoundaryBytes (${options.upperMemoryBoundaryBytes})`,
      );
    }
    this.upperBoundary = options.upperMemoryBoundaryBytes;
    this.lowerBoundary = options.lowerMemoryBoundaryBytes;
  }

  /**
   * Append a fragment to the session's pending records.
   * Runs space eviction when the total exceeds the upper boundary, which may
   * drop the new record itself if it is the oldest pending one left.
   */
  put(sessionId: number, fragment: EventFragment): EventRecord {
    const record: EventRecord = Object.freeze({
      sessionId,
      order: this.nextOrder++,
      timestamp: fragment.timestamp,
      data: fragment.data,
      sizeBytes: Buffer.byteLength(fragment.data, "utf8"),
    });

    const entry = this.getOrCreate(sessionId);
    entry.pending.push(record);
    entry.pendingBytes += record.sizeBytes;
    this.total += record.sizeBytes;

    if (this.total > this.upperBoundary) {
      this.evictBySpace();
    }
    return record;
  }

  /**
   * Move pending records, oldest first, to in-flight while their summed size
   * (each counted with `perRecordOverhead` extra bytes, e.g. a delimiter)
   * stays within `maxBytes`. The first record is always taken, even if it
   * alone is larger, so a record is never split and never blocks the queue.
   */
  drain(sessionId: number, maxBytes: number, perRecordOverhead = 0): EventRecord[] {
    const entry = this.entries.get(sessionId);
    if (!entry || entry.pending.length === 0) {
      return [];
    }

    let count = 0;
    let bytes = 0;
    let budget = 0;
    for (const record of entry.pending) {
      const cost = record.sizeBytes + perRecordOverhead;
      if (count > 0 && budget + cost > maxBytes) break;
      budget += cost;
      bytes += record.sizeBytes;
      count++;
    }

    const drained = entry.pending.splice(0, count);
    entry.inFlight.push(...drained);
    entry.pendingBytes -= bytes;
    entry.inFlightBytes += bytes;
    return drained;
  }

  /** Permanently remove records that the collector accepted. */
  confirmSent(sessionId: number, records: readonly EventRecord[]): void {
    const entry = this.entries.get(sessionId);
    if (!entry) return;

    const removed = this.takeInFlight(entry, records);
    this.total -= removed.bytes;
    this.dropIfEmpty(sessionId, entry);
  }

  /**
   * Put records whose send failed back at the head of pending, in their
   * original order. Records that are no longer in flight (for example because
   * the session was purged meanwhile) are not restored.
   */
  requeue(sessionId: number, records: readonly EventRecord[]): void {
    const entry = this.entries.get(sessionId);
    if (!entry) return;

    const restored = this.takeInFlight(entry, records);
    if (restored.records.length === 0) return;

    restored.records.sort((a, b) => a.order - b.order);
    entry.pending = [...restored.records, ...entry.pending];
    entry.pendingBytes += restored.bytes;
  }

  /** Drop everything buffered for the session, in flight or not. */
  purge(sessionId: number): void {
    const entry = this.entries.get(sessionId);
    if (!entry) return;
    this.total -= entry.pendingBytes + entry.inFlightBytes;
    this.entries.delete(sessionId);
  }

  purgeAll(): void {
    this.entries.clear();
    this.total = 0;
  }

  isEmpty(sessionId: number): boolean {
    const entry = this.entries.get(sessionId);
    return !entry || (entry.pending.length === 0 && entry.inFlight.length === 0);
  }

  /**
   * Drop pending records recorded before `cutoff` (epoch ms).
   * @returns number of records removed
   */
  evictOlderThan(cutoff: number): number {
    let removedTotal = 0;
    for (const [sessionId, entry] of this.entries) {
      let removedBytes = 0;
      const kept = entry.pending.filter((record) => {
        if (record.timestamp >= cutoff) return true;
        removedBytes += record.sizeBytes;
        return false;
      });
      const removed = entry.pending.length - kept.length;
      if (removed === 0) continue;

      entry.pending = kept;
      entry.pendingBytes -= removedBytes;
      this.total -= removedBytes;
      removedTotal += removed;
      this.notifyEvicted(sessionId, removed, "age");
      this.dropIfEmpty(sessionId, entry);
    }
    return removedTotal;
  }

  totalBytes(): number {
    return this.total;
  }

  pendingBytes(sessionId: number): number {
    return this.entries.get(sessionId)?.pendingBytes ?? 0;
  }

  inFlightBytes(sessionId: number): number {
    return this.entries.get(sessionId)?.inFlightBytes ?? 0;
  }

  pendingRecords(sessionId: number): readonly EventRecord[] {
    return [...(this.entries.get(sessionId)?.pending ?? [])];
  }

  sessionIds(): number[] {
    return [...this.entries.keys()];
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private getOrCreate(sessionId: number): CacheEntry {
    let entry = this.entries.get(sessionId);
    if (!entry) {
      entry = { pending: [], inFlight: [], pendingBytes: 0, inFlightBytes: 0 };
      this.entries.set(sessionId, entry);
    }
    return entry;
  }

  private takeInFlight(
    entry: CacheEntry,
    records: readonly EventRecord[],
  ): { records: EventRecord[]; bytes: number } {
    const wanted = new Set(records.map((r) => r.order));
    const taken: EventRecord[] = [];
    let bytes = 0;
    entry.inFlight = entry.inFlight.filter((record) => {
      if (!wanted.has(record.order)) return true;
      taken.push(record);
      bytes += record.sizeBytes;
      return false;
    });
    entry.inFlightBytes -= bytes;
    return { records: taken, bytes };
  }

  private dropIfEmpty(sessionId: number, entry: CacheEntry): void {
    if (entry.pending.length === 0 && entry.inFlight.length === 0) {
      this.entries.delete(sessionId);
    }
  }

  /**
   * Remove the globally oldest pending record until the total is at or below
   * the lower boundary. Oldest means lowest emission order; equal orders are
   * broken by ascending session id. Stops early when only in-flight data is
   * left, leaving the total above the boundary.
   */
  private evictBySpace(): void {
    const before = this.total;
    const counts = new Map<number, number>();

    while (this.total > this.lowerBoundary) {
      const victim = this.findOldestPending();
      if (!victim) {
        log.debug(
          `Space eviction stopped at ${this.total} bytes: remaining data is in flight`,
        );
        break;
      }
      const [sessionId, entry] = victim;
      const record = entry.pending.shift();
      if (!record) break;
      entry.pendingBytes -= record.sizeBytes;
      this.total -= record.sizeBytes;
      counts.set(sessionId, (counts.get(sessionId) ?? 0) + 1);
      this.dropIfEmpty(sessionId, entry);
    }

    log.info(`Space eviction freed ${before - this.total} bytes (now ${this.total})`);
    for (const [sessionId, count] of counts) {
      this.notifyEvicted(sessionId, count, "space");
    }
  }

  private findOldestPending(): [number, CacheEntry] | undefined {
    let best: [number, CacheEntry] | undefined;
    let bestOrder = Number.POSITIVE_INFINITY;
    for (const [sessionId, entry] of this.entries) {
      const head = entry.pending[0];
      if (!head) continue;
      if (
        head.order < bestOrder ||
        (head.order === bestOrder && best !== undefined && sessionId < best[0])
      ) {
        best = [sessionId, entry];
        bestOrder = head.order;
      }
    }
    return best;
  }

  private notifyEvicted(sessionId: number, count: number, reason: EvictionReason): void {
    log.debug(`Evicted ${count} record(s) of session ${sessionId} (${reason})`);
    this.emit("evicted", sessionId, count, reason);
  }
}

import type { RecordArena } from './arena.js';
import type { Handle, TimerRecord } from './record.js';

/**
 * Identity -> head of a doubly linked chain of records sharing that identity.
 * Chains are newest-first; an identity with no live records has no entry.
 */
export class IdentityIndex<Time, Identity> {
  private heads = new Map<Identity, Handle>();

  constructor(private readonly arena: RecordArena<TimerRecord<Time, Identity>>) {}

  /** Number of identities with at least one pending record. */
  size(): number { return this.heads.size; }

  has(identity: Identity): boolean { return this.heads.has(identity); }

  find(identity: Identity): Handle | undefined { return this.heads.get(identity); }

  identities(): Identity[] { return [...this.heads.keys()]; }

  register(identity: Identity, h: Handle): void {
    const rec = this.arena.get(h);
    const head = this.heads.get(identity);
    rec.chainPrev = null;
    rec.chainNext = head ?? null;
    if (head !== undefined) this.arena.get(head).chainPrev = h;
    this.heads.set(identity, h);
  }

  unlink(h: Handle): void {
    const rec = this.arena.get(h);
    if (rec.chainPrev !== null) this.arena.get(rec.chainPrev).chainNext = rec.chainNext;
    else if (rec.chainNext !== null) this.heads.set(rec.identity, rec.chainNext);
    else this.heads.delete(rec.identity);
    if (rec.chainNext !== null) this.arena.get(rec.chainNext).chainPrev = rec.chainPrev;
    rec.chainPrev = null;
    rec.chainNext = null;
  }

  /** Handles of one identity, head to tail. */
  chain(identity: Identity): Handle[] {
    const out: Handle[] = [];
    let h = this.heads.get(identity) ?? null;
    while (h !== null) {
      out.push(h);
      h = this.arena.get(h).chainNext;
    }
    return out;
  }

  violations(): string[] {
    const out: string[] = [];
    for (const [identity, head] of this.heads) {
      let prev: Handle | null = null;
      let h: Handle | null = head;
      while (h !== null) {
        if (!this.arena.has(h)) { out.push(`chain of ${String(identity)} reaches released handle ${h}`); break; }
        const rec = this.arena.get(h);
        if (rec.identity !== identity) out.push(`handle ${h} is chained under the wrong identity`);
        if (rec.chainPrev !== prev) out.push(`handle ${h} has chainPrev ${rec.chainPrev}, expected ${prev}`);
        prev = h;
        h = rec.chainNext;
      }
    }
    return out;
  }
}

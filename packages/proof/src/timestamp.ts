/**
 * @chronostamp/proof — Proof DAG.
 *
 * A Timestamp is a node claiming that `msg` existed. It holds:
 * - a set of attestations on `msg` itself
 * - at most one child per distinct operation, where the child's message is
 *   that operation applied to `msg`
 *
 * Nodes may be shared between parents (the Merkle aggregator does this), so
 * the structure is a DAG. Merging is the only way knowledge is combined:
 * attestations are unioned and children merged recursively, which makes
 * merge commutative and idempotent.
 */

import {
  attestationKey,
  compareAttestations,
  type Attestation,
} from "./attestation.js";
import { bytesEqual, toHex } from "./bytes.js";
import { applyOp, compareOps, opKey, type Op } from "./op.js";

// =============================================================================
// Types
// =============================================================================

/** An outgoing edge of a proof node. */
export interface OpEdge {
  readonly op: Op;
  readonly stamp: Timestamp;
}

/** An attestation together with the message it attests. */
export interface AttestedMessage {
  readonly msg: Uint8Array;
  readonly attestation: Attestation;
}

// =============================================================================
// Timestamp
// =============================================================================

export class Timestamp {
  readonly msg: Uint8Array;

  private readonly _attestations = new Map<string, Attestation>();

  private readonly _ops = new Map<string, OpEdge>();

  constructor(msg: Uint8Array) {
    this.msg = Uint8Array.from(msg);
  }

  // ─── Attestations ───────────────────────────────────────────────────

  /** Attestations on this node, sorted. */
  get attestations(): readonly Attestation[] {
    return [...this._attestations.values()].sort(compareAttestations);
  }

  get attestationCount(): number {
    return this._attestations.size;
  }

  /** Returns true if the attestation was not already present. */
  addAttestation(attestation: Attestation): boolean {
    const key = attestationKey(attestation);
    if (this._attestations.has(key)) return false;
    this._attestations.set(key, attestation);
    return true;
  }

  removeAttestation(attestation: Attestation): boolean {
    return this._attestations.delete(attestationKey(attestation));
  }

  hasAttestation(attestation: Attestation): boolean {
    return this._attestations.has(attestationKey(attestation));
  }

  // ─── Operations ─────────────────────────────────────────────────────

  /** Outgoing edges, sorted by operation. */
  get ops(): readonly OpEdge[] {
    return [...this._ops.values()].sort((a, b) => compareOps(a.op, b.op));
  }

  get opCount(): number {
    return this._ops.size;
  }

  getOp(op: Op): Timestamp | undefined {
    return this._ops.get(opKey(op))?.stamp;
  }

  /**
   * Return the child for `op`, creating an empty one if needed.
   */
  addOp(op: Op): Timestamp {
    const existing = this._ops.get(opKey(op));
    if (existing !== undefined) return existing.stamp;

    const stamp = new Timestamp(applyOp(op, this.msg));
    this._ops.set(opKey(op), { op, stamp });
    return stamp;
  }

  /**
   * Attach an existing node under `op`, replacing any current child.
   *
   * @throws Error if `stamp.msg` is not the result of applying `op`
   */
  setOp(op: Op, stamp: Timestamp): void {
    const expected = applyOp(op, this.msg);
    if (!bytesEqual(expected, stamp.msg)) {
      throw new Error(
        `Cannot attach ${toHex(stamp.msg)} under ${opKey(op)}: expected ${toHex(expected)}`,
      );
    }
    this._ops.set(opKey(op), { op, stamp });
  }

  // ─── Merge ──────────────────────────────────────────────────────────

  /**
   * Merge everything known by `other` into this node.
   *
   * @throws Error if the messages differ
   */
  merge(other: Timestamp): void {
    if (!bytesEqual(this.msg, other.msg)) {
      throw new Error(
        `Cannot merge timestamps for different messages: ${toHex(this.msg)} != ${toHex(other.msg)}`,
      );
    }
    if (other === this) return;

    for (const attestation of other._attestations.values()) {
      this.addAttestation(attestation);
    }
    for (const { op, stamp } of other._ops.values()) {
      this.addOp(op).merge(stamp);
    }
  }

  // ─── Traversal ──────────────────────────────────────────────────────

  /**
   * Every attestation reachable from this node, paired with the message it
   * attests. Shared nodes are reported once per path.
   */
  *allAttestations(): Generator<AttestedMessage> {
    for (const attestation of this.attestations) {
      yield { msg: this.msg, attestation };
    }
    for (const { stamp } of this.ops) {
      yield* stamp.allAttestations();
    }
  }

  /** Pre-order walk over this node and its descendants. */
  *nodes(): Generator<Timestamp> {
    yield this;
    for (const { stamp } of this.ops) {
      yield* stamp.nodes();
    }
  }

  /** True when no attestation exists anywhere below this node. */
  isBarren(): boolean {
    if (this._attestations.size > 0) return false;
    for (const { stamp } of this._ops.values()) {
      if (!stamp.isBarren()) return false;
    }
    return true;
  }

  isEmpty(): boolean {
    return this._attestations.size === 0 && this._ops.size === 0;
  }

  // ─── Copy & Compare ─────────────────────────────────────────────────

  /** Deep copy that keeps shared nodes shared. */
  clone(): Timestamp {
    return this._cloneInto(new Map());
  }

  private _cloneInto(seen: Map<Timestamp, Timestamp>): Timestamp {
    const known = seen.get(this);
    if (known !== undefined) return known;

    const copy = new Timestamp(this.msg);
    seen.set(this, copy);
    for (const [key, attestation] of this._attestations) {
      copy._attestations.set(key, attestation);
    }
    for (const [key, { op, stamp }] of this._ops) {
      copy._ops.set(key, { op, stamp: stamp._cloneInto(seen) });
    }
    return copy;
  }

  /** Structural equality: same message, attestations and subtrees. */
  equals(other: Timestamp): boolean {
    if (other === this) return true;
    if (!bytesEqual(this.msg, other.msg)) return false;
    if (this._attestations.size !== other._attestations.size) return false;
    if (this._ops.size !== other._ops.size) return false;

    for (const key of this._attestations.keys()) {
      if (!other._attestations.has(key)) return false;
    }
    for (const [key, { stamp }] of this._ops) {
      const theirs = other._ops.get(key);
      if (theirs === undefined || !stamp.equals(theirs.stamp)) return false;
    }
    return true;
  }
}

// Value Channel
// Uniform representation of values flowing between evaluated nodes, backed by a
// per-expression table of boxed host values.

import { isNil } from "./values";

/**
 * Reference to a boxed value, or one of the nil/false/true sentinels.
 */
export class ChannelRef {
  static readonly NIL = new ChannelRef(-1);
  static readonly FALSE = new ChannelRef(-2);
  static readonly TRUE = new ChannelRef(-3);

  private constructor(readonly index: number) {}

  /** Reference to a table slot. */
  static slot(index: number): ChannelRef {
    if (!Number.isInteger(index) || index < 0) {
      throw new RangeError(`invalid value table index: ${index}`);
    }
    return new ChannelRef(index);
  }

  get isSentinel(): boolean {
    return this.index < 0;
  }

  toString(): string {
    switch (this) {
      case ChannelRef.NIL:
        return "nil";
      case ChannelRef.FALSE:
        return "false";
      case ChannelRef.TRUE:
        return "true";
      default:
        return `#${this.index}`;
    }
  }
}

/**
 * Channel value: numbers travel unboxed, everything else by reference.
 */
export type ChannelValue = number | ChannelRef;

/**
 * Stable string key for a channel value, used to memoize folded calls.
 */
export function channelKey(value: ChannelValue): string {
  if (typeof value === "number") {
    return Object.is(value, -0) ? "-0" : String(value);
  }
  return value.toString();
}

/**
 * ValueTable stores the boxed values referenced by channel values.
 *
 * An expression owns one sealed table of constants. Each evaluation stacks a
 * scratch table on top of it, so slots below the constants' length stay valid
 * for the life of the expression and scratch slots die with the call.
 */
export class ValueTable {
  private readonly values: unknown[] = [];
  private readonly offset: number;
  private sealed = false;

  constructor(private readonly parent?: ValueTable) {
    this.offset = parent ? parent.length : 0;
  }

  /** Number of slots visible through this table, including its parent's. */
  get length(): number {
    return this.offset + this.values.length;
  }

  /** Number of slots owned by enclosing tables. */
  get baseline(): number {
    return this.offset;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Stop accepting new values.
   */
  seal(): void {
    this.sealed = true;
  }

  /**
   * Create a table for one evaluation call, layered over this one.
   */
  scratch(): ValueTable {
    return new ValueTable(this);
  }

  /**
   * Encode a host value as a channel value, boxing it if needed.
   */
  store(value: unknown): ChannelValue {
    switch (typeof value) {
      case "number":
        return value;
      case "boolean":
        return value ? ChannelRef.TRUE : ChannelRef.FALSE;
      case "bigint":
        if (value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
          return Number(value);
        }
        break;
      default:
        if (isNil(value)) {
          return ChannelRef.NIL;
        }
    }
    if (this.sealed) {
      throw new Error("value table is sealed");
    }
    const ref = ChannelRef.slot(this.length);
    this.values.push(value);
    return ref;
  }

  /**
   * Decode a channel value back into the host value it carries.
   */
  load(channel: ChannelValue): unknown {
    if (typeof channel === "number") {
      return channel;
    }
    switch (channel) {
      case ChannelRef.NIL:
        return null;
      case ChannelRef.FALSE:
        return false;
      case ChannelRef.TRUE:
        return true;
      default:
        break;
    }
    if (channel.index < this.offset) {
      if (!this.parent) {
        throw new RangeError(`stale value reference ${channel}`);
      }
      return this.parent.load(channel);
    }
    const position = channel.index - this.offset;
    if (position >= this.values.length) {
      throw new RangeError(`stale value reference ${channel}`);
    }
    return this.values[position];
  }
}

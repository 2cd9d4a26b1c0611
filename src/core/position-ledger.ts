/**
 * Position Ledger
 *
 * Holds at most one open position (single-position-per-bot model).
 * Only the state machine mutates it.
 */

export interface Position {
  /** Fraction of max allocation, in [0, 1] */
  size: number;
  /** Reference price at entry (> 0) */
  entryPrice: number;
  /** Epoch ms at entry */
  openedAt: number;
}

export type PositionSnapshot = Readonly<Position>;

export class PositionLedger {
  private position: Position | null = null;

  get isOpen(): boolean {
    return this.position !== null;
  }

  /**
   * Frozen copy of the open position, or null
   */
  current(): PositionSnapshot | null {
    return this.position ? Object.freeze({ ...this.position }) : null;
  }

  /**
   * @throws Error if a position is already open or the inputs are invalid
   */
  open(params: Position): PositionSnapshot {
    if (this.position) {
      throw new Error("PositionLedger: a position is already open");
    }
    if (!(params.size >= 0 && params.size <= 1)) {
      throw new Error(`PositionLedger: size must be in [0, 1] (got ${params.size})`);
    }
    if (!(params.entryPrice > 0)) {
      throw new Error(`PositionLedger: entry price must be > 0 (got ${params.entryPrice})`);
    }
    this.position = { ...params };
    return Object.freeze({ ...this.position });
  }

  /**
   * Clear the open position and return what it was
   * @throws Error if nothing is open
   */
  close(): PositionSnapshot {
    if (!this.position) {
      throw new Error("PositionLedger: no open position to close");
    }
    const closed = Object.freeze({ ...this.position });
    this.position = null;
    return closed;
  }
}

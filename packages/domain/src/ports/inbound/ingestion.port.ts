// ---------------------------------------------------------------------------
// Result of one poll tick
// ---------------------------------------------------------------------------

export interface TickSummary {
  fetched: number;
  inserted: number;
  failed: number;
}

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

export interface IngestionPort {
  /**
   * Open a store session, fetch every device and insert one row per device.
   * Per-device failures are counted; connection and fetch failures reject.
   */
  runTick(): Promise<TickSummary>;
}

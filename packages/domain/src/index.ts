// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/device-reading.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/ingestion.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/telemetry-source.port.js';
export * from './ports/outbound/device-reading-store.port.js';
export * from './ports/outbound/clock.port.js';

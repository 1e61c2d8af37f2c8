import type { ClockPort } from '@vizvolt/domain';

/** Local wall clock used to stamp created_at. */
export const wallClockNow: ClockPort = () => new Date();

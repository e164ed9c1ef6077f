/**
 * Coarse progress report (per partition, never per row).
 * Implementations must return quickly; the caller does not wait on them.
 */
export type ProgressCallback = (current: number, total: number, message: string) => void;

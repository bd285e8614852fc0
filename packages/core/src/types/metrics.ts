/**
 * Resource usage of the running process.
 */
export interface ProcessMetrics {
  /** Resident set size in MiB. */
  memoryMb: number;

  /** System-wide CPU load in percent. */
  cpuPercent: number;

  uptimeSeconds: number;

  /** Uptime as `H:MM:SS`, prefixed with `N day(s), ` past 24 hours. */
  uptimeFriendly: string;
}

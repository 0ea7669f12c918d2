// Environment configuration
export function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export const config = {
  // Output Configuration
  defaultOutputPath: process.env.OUTPUT_PATH || 'output.csv',
  flushInterval: parsePositiveInt(process.env.FLUSH_INTERVAL, 50),

  // Certificate Discovery Configuration
  dohUrl: process.env.DOH_URL || 'https://dns.google/resolve',
  discoveryTimeoutMs: parsePositiveInt(process.env.DISCOVERY_TIMEOUT_MS, 10000) // 10 seconds
};

/**
 * Conversions between Kubernetes quantity strings and plain numbers.
 * CPU is tracked in millicores and memory/storage in bytes.
 */

const BINARY_SUFFIXES: Record<string, number> = {
  Ki: 1024,
  Mi: 1024 ** 2,
  Gi: 1024 ** 3,
  Ti: 1024 ** 4,
  Pi: 1024 ** 5,
  Ei: 1024 ** 6,
};

const DECIMAL_SUFFIXES: Record<string, number> = {
  n: 1e-9,
  u: 1e-6,
  m: 1e-3,
  '': 1,
  k: 1e3,
  K: 1e3,
  M: 1e6,
  G: 1e9,
  T: 1e12,
  P: 1e15,
  E: 1e18,
};

const QUANTITY_PATTERN = /^([+-]?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)([a-zA-Z]{0,2})$/;

/** Parses a quantity into its base unit. Returns null for malformed input. */
export function parseQuantity(quantity: string): number | null {
  const match = QUANTITY_PATTERN.exec(quantity.trim());
  if (!match) {
    return null;
  }
  const [, numberPart, suffix] = match;
  const value = Number(numberPart);
  if (Number.isNaN(value)) {
    return null;
  }
  const multiplier = BINARY_SUFFIXES[suffix] ?? DECIMAL_SUFFIXES[suffix];
  return multiplier === undefined ? null : value * multiplier;
}

export function parseCpuMillicores(quantity: string): number | null {
  const cores = parseQuantity(quantity);
  return cores === null ? null : Math.round(cores * 1000);
}

export function parseBytes(quantity: string): number | null {
  const bytes = parseQuantity(quantity);
  return bytes === null ? null : Math.round(bytes);
}

export const formatCpu = (millicores: number): string => `${Math.round(millicores)}m`;

export function formatBytes(bytes: number): string {
  for (const suffix of ['Ti', 'Gi', 'Mi', 'Ki']) {
    const unit = BINARY_SUFFIXES[suffix];
    if (bytes >= unit && bytes % unit === 0) {
      return `${bytes / unit}${suffix}`;
    }
  }
  return String(Math.round(bytes));
}

type ImportPerfCounterSnapshot = Map<string, number>;

type ImportPerfSummary = {
  reference: string;
  success: boolean;
  elapsedMs: number;
  counters: Readonly<Record<string, number>>;
};

const IMPORT_PERF_ENV = "IMPORTKIT_PERF";
const IMPORT_TRACE_ENV = "IMPORTKIT_TRACE";

const readEnv = (name: string): string | undefined => {
  const processValue = (globalThis as {
    process?: { env?: Record<string, string | undefined> };
  }).process;
  return processValue?.env?.[name];
};

const isTruthyFlag = (raw: string | undefined): boolean => {
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
};

const PERF_ENABLED = isTruthyFlag(readEnv(IMPORT_PERF_ENV));
const TRACE_ENABLED = isTruthyFlag(readEnv(IMPORT_TRACE_ENV));

const counters = new Map<string, number>();

const roundMs = (value: number): number =>
  Math.round(value * 1000) / 1000;

const toSortedRecord = (
  entries: ReadonlyMap<string, number>,
): Record<string, number> =>
  Object.fromEntries(
    Array.from(entries.entries()).sort(([left], [right]) =>
      left.localeCompare(right),
    ),
  );

export const isImportPerfEnabled = (): boolean => PERF_ENABLED;

export const isImportTraceEnabled = (): boolean => TRACE_ENABLED;

export const incrementImportPerfCounter = (
  name: string,
  amount = 1,
): void => {
  if (!PERF_ENABLED || amount === 0) {
    return;
  }
  counters.set(name, (counters.get(name) ?? 0) + amount);
};

export const snapshotImportPerfCounters = (): ImportPerfCounterSnapshot =>
  PERF_ENABLED ? new Map(counters) : new Map();

export const diffImportPerfCounters = ({
  before,
  after,
}: {
  before: ReadonlyMap<string, number>;
  after: ReadonlyMap<string, number>;
}): Record<string, number> => {
  if (!PERF_ENABLED) {
    return {};
  }

  const keys = new Set<string>([...before.keys(), ...after.keys()]);
  const delta = new Map<string, number>();
  keys.forEach((key) => {
    const diff = (after.get(key) ?? 0) - (before.get(key) ?? 0);
    if (diff !== 0) {
      delta.set(key, diff);
    }
  });
  return toSortedRecord(delta);
};

export const logImportPerfSummary = ({
  reference,
  success,
  elapsedMs,
  counters,
}: ImportPerfSummary): void => {
  if (!PERF_ENABLED) {
    return;
  }

  const summary = {
    reference,
    success,
    elapsedMs: roundMs(elapsedMs),
    counters,
  };

  console.error(`[importkit:perf] ${JSON.stringify(summary)}`);
};

/** Writes one `[importkit:imports]` line to stderr when tracing is enabled. */
export const traceImport = (
  message: string,
  details?: Readonly<Record<string, unknown>>,
): void => {
  if (!TRACE_ENABLED) {
    return;
  }

  const suffix = details ? ` ${JSON.stringify(details)}` : "";
  console.error(`[importkit:imports] ${message}${suffix}`);
};

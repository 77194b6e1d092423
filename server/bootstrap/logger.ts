import pino, { type Logger } from "pino";
import { AsyncLocalStorage } from "node:async_hooks";

export type { Logger };

export const correlationStore = new AsyncLocalStorage<{ correlationId: string }>();

// Claimed identity facts and identifiers never reach the log stream
const REDACT_PATHS = [
  "claims.identifierLastDigits",
  "claims.lastPaymentAmount",
  "debtor.ssnLastFour",
  "debtor.email",
  "debtor.phone",
  "*.ssnLastFour"
];

export function getLogger(level: string, pretty: boolean): Logger {
  return pino({
    level,
    transport: pretty ? { target: "pino-pretty", options: { colorize: true } } : undefined,
    base: undefined, // do not inject pid and hostname automatically
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    mixin() {
      const correlationId = currentCorrelationId();
      return correlationId ? { correlationId } : {};
    }
  });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function withCorrelation<T>(cid: string, fn: () => Promise<T>) {
  return correlationStore.run({ correlationId: cid }, fn);
}

export function currentCorrelationId(): string | undefined {
  return correlationStore.getStore()?.correlationId;
}

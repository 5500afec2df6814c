export default {
  logLevel: "info",
  definitionsDir: ".workflow/definitions",
  storeDir: ".workflow/data",
  retry: {
    maxAttempts: 4,
    initialDelayMs: 250,
    multiplier: 2,
    maxDelayMs: 10_000,
  },
  scheduler: {
    pollIntervalMs: 1_000,
    lateToleranceMs: 5_000,
  },
};

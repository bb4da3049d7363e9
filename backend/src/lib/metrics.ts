import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from "prom-client";

export interface IntakeMetrics {
  registry: Registry;
  applicationsProcessed: Counter<"status">;
  applicationErrors: Counter<"kind">;
  stageTransitions: Counter<"stage" | "outcome">;
  applicationDuration: Histogram;
  batchesProcessed: Counter;
  batchDuration: Histogram;
  activeApplications: Gauge;
  queuedApplications: Gauge;
  circuitOpen: Gauge<"collaborator">;
}

const DURATION_BUCKETS = [0.1, 0.5, 1, 5, 15, 30, 60, 120, 300, 600, 1800];

/** Each call gets its own registry, so several orchestrators never share series. */
export const createMetrics = (options: { collectDefaults?: boolean } = {}): IntakeMetrics => {
  const registry = new Registry();
  if (options.collectDefaults) {
    collectDefaultMetrics({ register: registry, prefix: "intake_" });
  }

  return {
    registry,
    applicationsProcessed: new Counter({
      name: "intake_applications_processed_total",
      help: "Application runs finished, by item status",
      labelNames: ["status"] as const,
      registers: [registry],
    }),
    applicationErrors: new Counter({
      name: "intake_application_errors_total",
      help: "Errors recorded against application runs, by kind",
      labelNames: ["kind"] as const,
      registers: [registry],
    }),
    stageTransitions: new Counter({
      name: "intake_stage_transitions_total",
      help: "Persisted workflow transitions, by target stage and outcome",
      labelNames: ["stage", "outcome"] as const,
      registers: [registry],
    }),
    applicationDuration: new Histogram({
      name: "intake_application_duration_seconds",
      help: "Wall-clock time of one application run",
      buckets: DURATION_BUCKETS,
      registers: [registry],
    }),
    batchesProcessed: new Counter({
      name: "intake_batches_processed_total",
      help: "Batches run to completion",
      registers: [registry],
    }),
    batchDuration: new Histogram({
      name: "intake_batch_duration_seconds",
      help: "Wall-clock time of one batch",
      buckets: DURATION_BUCKETS,
      registers: [registry],
    }),
    activeApplications: new Gauge({
      name: "intake_active_applications",
      help: "Application runs holding a concurrency slot",
      registers: [registry],
    }),
    queuedApplications: new Gauge({
      name: "intake_queued_applications",
      help: "Application runs waiting for a concurrency slot",
      registers: [registry],
    }),
    circuitOpen: new Gauge({
      name: "intake_circuit_breaker_open",
      help: "Whether the collaborator's circuit breaker is open (1) or not (0)",
      labelNames: ["collaborator"] as const,
      registers: [registry],
    }),
  };
};

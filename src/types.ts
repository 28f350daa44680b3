export interface ConversionSettings {
  quality: number;
  lossless: boolean;
  appendName: boolean;
}

export interface ConversionTask extends Readonly<ConversionSettings> {
  readonly sourcePath: string;
  /** Mirrored destination before collision resolution. */
  readonly destinationPath: string;
}

export type CodecClassification =
  | { readonly kind: "still"; readonly codec: string }
  | { readonly kind: "animated-apng"; readonly codec: "apng" }
  | { readonly kind: "unrecognized"; readonly codec: string }
  | { readonly kind: "probe-failed"; readonly reason: string };

export type TaskOutcome =
  | { readonly status: "succeeded"; readonly sourcePath: string; readonly outputPath: string }
  | {
      readonly status: "skipped";
      readonly sourcePath: string;
      readonly destinationPath: string;
      readonly reason: string;
    }
  | { readonly status: "failed"; readonly sourcePath: string; readonly reason: string }
  | { readonly status: "unrecognized-codec"; readonly sourcePath: string; readonly codec: string };

export type TaskStatus = TaskOutcome["status"];

export type OutcomeOf<S extends TaskStatus> = Extract<TaskOutcome, { status: S }>;

export type TaskState = "pending" | "probing" | "converting" | TaskStatus;

export interface RunCounts {
  discovered: number;
  succeeded: number;
  skipped: number;
  failed: number;
  unrecognized: number;
}

export interface RunReport {
  counts: RunCounts;
  succeeded: OutcomeOf<"succeeded">[];
  skipped: OutcomeOf<"skipped">[];
  failed: OutcomeOf<"failed">[];
  unrecognized: OutcomeOf<"unrecognized-codec">[];
  durationMs: number;
}

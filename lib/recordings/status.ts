/**
 * Recording job status machine.
 *
 * uploaded → transcribing → transcribed → processing → synced
 * Any non-terminal status may move to failed. A reset (reprocess or stuck-job
 * recovery) returns a job to uploaded from any status and is not an edge here.
 */

export const RECORDING_STATUSES = [
  "uploaded",
  "transcribing",
  "transcribed",
  "processing",
  "synced",
  "failed",
] as const;

export type RecordingStatus = (typeof RECORDING_STATUSES)[number];

export const TERMINAL_STATUSES: readonly RecordingStatus[] = ["synced", "failed"];

export const ACTIVE_STATUSES: readonly RecordingStatus[] = [
  "uploaded",
  "transcribing",
  "transcribed",
  "processing",
];

const ALLOWED_TRANSITIONS: Record<RecordingStatus, RecordingStatus[]> = {
  uploaded: ["transcribing", "failed"],
  transcribing: ["transcribed", "failed"],
  transcribed: ["processing", "failed"],
  processing: ["synced", "failed"],
  synced: [],
  failed: [],
};

export class InvalidTransitionError extends Error {
  readonly from: RecordingStatus;
  readonly to: RecordingStatus;

  constructor(from: RecordingStatus, to: RecordingStatus) {
    super(`Invalid recording transition from ${from} to ${to}`);
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
  }
}

export function isTerminalStatus(status: RecordingStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function canTransition(from: RecordingStatus, to: RecordingStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: RecordingStatus, to: RecordingStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

export function isRecordingStatus(value: unknown): value is RecordingStatus {
  return typeof value === "string" && (RECORDING_STATUSES as readonly string[]).includes(value);
}

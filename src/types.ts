export type RunningPhase = "working" | "resting";

export type TimerPhase =
  | { kind: "inactive" }
  | { kind: "working" }
  | { kind: "resting" }
  | { kind: "paused"; pausedAt: number; resumeTo: RunningPhase };

export type PhaseKind = TimerPhase["kind"];

export interface TimerView {
  phase: PhaseKind;
  resumeTo?: RunningPhase;
  workMs: number;
  restMs: number;
  remainingMs: number;
  display: string;
}

export interface AlertRecord {
  id: string;
  phase: RunningPhase;
  at: string;
}

export interface TimerUpdateResult {
  timer: TimerView;
  message: string;
  alerts: AlertRecord[];
}

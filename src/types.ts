export type Clock = () => number;

export type RecordingPhase = 'idle' | 'starting' | 'recording' | 'stopping';

export type MotionOutcome =
  | 'ignored'
  | 'already-recording'
  | 'start-pending'
  | 'cooldown'
  | 'started'
  | 'start-failed';

export interface RecordingStateSnapshot {
  camera: string;
  trackId: number;
  phase: RecordingPhase;
  isRecording: boolean;
  lastMotionAt: number | null;
  lastStartAt: number | null;
  watchdogActive: boolean;
  episodes: number;
}

export interface CameraSettings {
  name: string;
  rtsp: string;
  nvrChannel: number;
  trackId: number;
  threshold: number;
  noMotionTimeoutMs: number;
  cooldownMs: number;
}

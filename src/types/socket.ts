import type { PreCallBriefInput } from "../services/brief/PreCallBrief";
import type { RawTranscriptPayload } from "../services/transcription/SegmentNormalizer";
import type {
  CallSummary,
  LiveUpdate,
  MeddicProgress,
  OperationalSignal,
  SalesStage,
  Speaker,
} from "./index";

export interface AckFailure {
  success: false;
  error: string;
  code?: string;
}

export type AckResponse<T extends object = object> = ({ success: true } & T) | AckFailure;

export type Ack<T extends object = object> = (response: AckResponse<T>) => void;

export interface CallStartedPayload {
  callId: string;
  degraded: boolean;
  meddic: MeddicProgress;
  stage: SalesStage;
}

// Payloads are validated on arrival; these types describe what clients send
export interface StartCallPayload {
  brief?: PreCallBriefInput;
  speakerMap?: Record<string, Speaker>;
}

export interface ClientToServerEvents {
  startCall: (payload: StartCallPayload | undefined, callback?: Ack<{ callId: string }>) => void;
  transcript: (
    payload: RawTranscriptPayload,
    callback?: Ack<{ accepted: boolean; segmentId: number | null }>
  ) => void;
  acknowledge: (
    payload: { suggestionId: string },
    callback?: Ack<{ acknowledged: boolean }>
  ) => void;
  endCall: (callback?: Ack<{ summary: CallSummary }>) => void;
}

export interface ServerToClientEvents {
  callStarted: (payload: CallStartedPayload) => void;
  suggestion: (update: LiveUpdate) => void;
  meddicUpdate: (progress: MeddicProgress) => void;
  stageChange: (stage: SalesStage) => void;
  operational: (signal: OperationalSignal) => void;
  callEnded: (summary: CallSummary) => void;
}

/**
 * Shared Types for the Smart Glasses voice engine
 */

// ============== Session State ==============

export type SessionState =
  | 'SLEEP'   // Idle: only the wake word engine listens
  | 'ACTIVE'; // Conversation: capture, respond, barge-in

/** Who currently reads from the microphone */
export type MicConsumer = 'wakeword' | 'capture' | 'monitor';

export type SleepReason = 'timeout' | 'phrase' | 'request' | 'shutdown';

// ============== Audio ==============

/** Mono PCM16 samples */
export type AudioFrame = Int16Array;

// ============== Wake Word ==============

export type WakeWordMethod =
  | 'model'      // Keyword spotting model (Porcupine)
  | 'streaming'  // Streaming transcript containing the keyword
  | 'energy';    // Sudden loudness (diagnostic only)

export interface DetectorConfig {
  readonly method: WakeWordMethod;
  readonly keyword: string;
  readonly sensitivity: number;  // 0-1
  readonly sampleRate: number;
  readonly frameSize: number;
}

// ============== Playback ==============

export type PlaybackOutcome = 'completed' | 'cancelled' | 'failed';

export interface PlaybackSession {
  readonly id: string;
  readonly text: string;
  readonly startedAt: number;
  readonly cancelled: boolean;
  /** Resolves once the playback worker has stopped. Never rejects. */
  readonly done: Promise<PlaybackOutcome>;
}

// ============== Events ==============

export type EventType =
  // Client -> Server
  | 'update_settings'   // Settings patch from companion app
  | 'sleep'             // Request to return to SLEEP
  // Server -> Client
  | 'state_change'      // SessionState changed or status snapshot
  | 'wake'              // Wake word detected
  | 'utterance'         // Recognized user speech
  | 'response'          // Assistant response being spoken
  | 'interruption'      // Barge-in cancelled a response
  | 'settings'          // Settings snapshot after an update
  | 'log'               // Debug log message
  | 'error';            // Error message

// Client -> Server
export interface ClientMessage {
  type: EventType;
  payload: unknown;
}

// Server -> Client
export interface ServerMessage {
  type: EventType;
  payload: unknown;
  ts: number;
  turnId?: string;
}

/**
 * Error types for the voice engine
 */

/** The microphone could not be opened. The engine cannot run without it. */
export class MicrophoneUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MicrophoneUnavailableError';
  }
}

/** A wake word backend could not be initialized (missing key, missing model). */
export class WakeWordBackendError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WakeWordBackendError';
  }
}

export class AudioOutputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AudioOutputError';
  }
}

export class SettingsValidationError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'SettingsValidationError';
  }
}

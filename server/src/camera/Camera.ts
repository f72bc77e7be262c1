/**
 * Camera collaborator used by special commands
 */
export interface Camera {
  /**
   * Capture a still image. Resolves with the saved file path.
   */
  takePhoto(): Promise<string>;

  /**
   * Record a clip of `durationSeconds`. Resolves with the saved file path.
   */
  recordVideo(durationSeconds: number): Promise<string>;
}

/**
 * Assistant Interface
 * Turns a recognized utterance into a spoken reply. Implementations catch
 * their own failures and answer with an apology instead of throwing.
 */
export interface Assistant {
  /**
   * Provider name for logging
   */
  readonly name: string;

  process(text: string, turnId?: string): Promise<string>;
}

export const APOLOGY = 'Sorry, I encountered an error processing your request.';

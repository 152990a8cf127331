/**
 * Confirmation prompt for destructive commands. `shows remove` asks before
 * deleting unless --yes was given.
 */
export interface PromptService {
  /** Resolves false when the user declines or aborts */
  confirm(message: string, initial?: boolean): Promise<boolean>;
}

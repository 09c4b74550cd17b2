/**
 * Read-only lookup from a spoken name to a handle on the notification channel
 */
export interface INameDirectory {
  lookup(name: string): string | undefined;

  /**
   * Number of known names
   */
  size(): number;
}

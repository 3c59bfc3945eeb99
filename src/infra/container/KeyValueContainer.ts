/**
 * Persistent byte store keyed by file name, shared between the process that
 * fetches data and the one that renders it
 *
 * Implementations throw ContainerUnavailableError when the store itself cannot
 * be reached. A missing entry is not an error: read() returns null.
 */
export interface KeyValueContainer {
  read(fileName: string): Promise<Uint8Array | null>;

  /**
   * Replace the entry atomically: readers see the old or the new bytes, never a mix
   */
  write(fileName: string, data: Uint8Array): Promise<void>;

  remove(fileName: string): Promise<void>;

  describe(): string;
}

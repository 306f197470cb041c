/**
 * Hooks for storage shared between processes.
 *
 * When the data directory lives on a volume that other processes commit to,
 * `reload` picks up their changes and `commit` publishes ours. A plain local
 * directory needs neither.
 */
export interface VolumeSync {
  reload(): void;
  commit(): void;
}

export const localVolume: VolumeSync = {
  reload: () => undefined,
  commit: () => undefined,
};

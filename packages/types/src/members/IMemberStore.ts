/**
 * Known usernames per chat.
 *
 * Keys are chat ids rendered as strings. Each value lists usernames without the
 * leading "@", in the order they were first seen, with no duplicates.
 */
export type MemberRegistry = Record<string, string[]>;

/**
 * Persistence contract for the member registry.
 *
 * The registry is always read and written as a whole. There is no locking:
 * callers performing load, mutate, save must accept that concurrent writers
 * race and the last write wins.
 */
export interface IMemberStore {
    /**
     * Read the full registry.
     *
     * @returns The stored registry, or an empty one when nothing has been saved yet
     * @throws PersistenceError when stored data exists but cannot be parsed
     */
    load(): Promise<MemberRegistry>;

    /**
     * Replace the stored registry.
     *
     * @throws PersistenceError when the data cannot be written
     */
    save(registry: MemberRegistry): Promise<void>;
}

/**
 * PreferencesRepository: key-value persistence for small client state.
 * Each key holds an ordered list of strings, replaced wholesale on every write.
 * Implement this for SQLite, a JSON file, or any other backend.
 */
export interface PreferencesRepository {
    /** Initialize the storage (create tables, etc.) */
    init(): void;

    /** The stored list, or null when the key has never been written */
    getStringList(key: string): Promise<string[] | null>;

    /** Replace the list under `key` in one atomic write */
    setStringList(key: string, values: readonly string[]): Promise<void>;

    close(): void;
}

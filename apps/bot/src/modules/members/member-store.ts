import path from 'path';
import fs from 'fs/promises';
import { z } from 'zod';
import type { IMemberStore, MemberRegistry } from '@tagall/types';
import { PersistenceError } from '../../lib/errors.js';

const registryFileSchema = z.record(z.string(), z.unknown());
const usernamesSchema = z.array(z.string());

/**
 * Member store backed by a single JSON file.
 *
 * The file holds one object mapping chat ids to arrays of usernames:
 *
 * ```json
 * {
 *     "-1001234567890": ["alice", "bob"]
 * }
 * ```
 *
 * Every load reads the whole file and every save rewrites it. A missing file reads
 * as an empty registry and is created by the first save. A file that exists but
 * is not a JSON object is an error; it is never overwritten with an empty registry.
 */
export class JsonFileMemberStore implements IMemberStore {
    /**
     * Absolute path of the backing file.
     */
    private readonly filePath: string;

    /**
     * Create a file-backed member store.
     *
     * @param filePath - Backing file, resolved against the working directory (default: members.json)
     */
    constructor(filePath = 'members.json') {
        this.filePath = path.resolve(filePath);
    }

    getFilePath(): string {
        return this.filePath;
    }

    /**
     * Read the registry from disk.
     *
     * Entries whose value is not an array of strings are skipped, and repeated
     * usernames within a chat are collapsed to their first occurrence.
     *
     * @returns Stored registry, or an empty registry when the file does not exist
     * @throws PersistenceError if the file cannot be read or does not contain a JSON object
     */
    async load(): Promise<MemberRegistry> {
        let raw: string;

        try {
            raw = await fs.readFile(this.filePath, 'utf-8');
        } catch (error) {
            if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
                return {};
            }

            throw new PersistenceError(
                `Failed to read members file: ${error instanceof Error ? error.message : 'Unknown error'}`,
                { filePath: this.filePath }
            );
        }

        let data: unknown;

        try {
            data = JSON.parse(raw);
        } catch (error) {
            throw new PersistenceError(
                `Members file is not valid JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
                { filePath: this.filePath }
            );
        }

        const parsed = registryFileSchema.safeParse(data);

        if (!parsed.success) {
            throw new PersistenceError('Members file must contain a JSON object', { filePath: this.filePath });
        }

        const registry: MemberRegistry = {};

        for (const [chatId, value] of Object.entries(parsed.data)) {
            const usernames = usernamesSchema.safeParse(value);
            if (usernames.success) {
                registry[chatId] = [...new Set(usernames.data)];
            }
        }

        return registry;
    }

    /**
     * Write the full registry to disk, replacing the previous contents.
     *
     * Creates the parent directory when it is missing.
     *
     * @throws PersistenceError if the directory or file cannot be written (permissions, disk full)
     */
    async save(registry: MemberRegistry): Promise<void> {
        try {
            await fs.mkdir(path.dirname(this.filePath), { recursive: true });
            await fs.writeFile(this.filePath, JSON.stringify(registry, null, 4), 'utf-8');
        } catch (error) {
            throw new PersistenceError(
                `Failed to write members file: ${error instanceof Error ? error.message : 'Unknown error'}`,
                { filePath: this.filePath }
            );
        }
    }
}

/**
 * Storage
 *
 * Thin filesystem layer shared by the state stores, the output manager
 * and discovery. Writes that other processes may read go through
 * writeFileAtomic (temp file + rename).
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { randomBytes } from 'node:crypto';
import { glob } from 'glob';

export interface Utility {
    exists(filePath: string): Promise<boolean>;
    isDirectory(dirPath: string): Promise<boolean>;
    isDirectoryWritable(dirPath: string): Promise<boolean>;
    createDirectory(dirPath: string): Promise<void>;
    readFile(filePath: string, encoding?: BufferEncoding): Promise<string>;
    writeFile(filePath: string, data: string, encoding?: BufferEncoding): Promise<void>;
    writeFileAtomic(filePath: string, data: string): Promise<void>;
    rename(from: string, to: string): Promise<void>;
    deleteFile(filePath: string): Promise<void>;
    removeDirectory(dirPath: string): Promise<void>;
    listFiles(directory: string, patterns: string[]): Promise<string[]>;
    listDirectories(directory: string): Promise<string[]>;
}

export interface StorageOptions {
    log?: (message: string, ...args: unknown[]) => void;
}

export const create = (options: StorageOptions = {}): Utility => {
    const log = options.log ?? (() => undefined);

    const exists = async (filePath: string): Promise<boolean> => {
        try {
            await fs.stat(filePath);
            return true;
        } catch {
            return false;
        }
    };

    const isDirectory = async (dirPath: string): Promise<boolean> => {
        try {
            const stats = await fs.stat(dirPath);
            return stats.isDirectory();
        } catch {
            return false;
        }
    };

    const isDirectoryWritable = async (dirPath: string): Promise<boolean> => {
        if (!await isDirectory(dirPath)) {
            return false;
        }
        try {
            await fs.access(dirPath, fs.constants.W_OK);
            return true;
        } catch {
            return false;
        }
    };

    const createDirectory = async (dirPath: string): Promise<void> => {
        await fs.mkdir(dirPath, { recursive: true });
    };

    const readFile = async (filePath: string, encoding: BufferEncoding = 'utf-8'): Promise<string> => {
        return fs.readFile(filePath, { encoding });
    };

    const writeFile = async (filePath: string, data: string, encoding: BufferEncoding = 'utf-8'): Promise<void> => {
        await fs.writeFile(filePath, data, { encoding });
    };

    const writeFileAtomic = async (filePath: string, data: string): Promise<void> => {
        const directory = path.dirname(filePath);
        await createDirectory(directory);
        const tempPath = path.join(directory, `.${path.basename(filePath)}.${randomBytes(4).toString('hex')}.tmp`);
        await fs.writeFile(tempPath, data, { encoding: 'utf-8' });
        try {
            await fs.rename(tempPath, filePath);
        } catch (error) {
            await fs.rm(tempPath, { force: true });
            throw error;
        }
        log('Atomically wrote %s', filePath);
    };

    const rename = async (from: string, to: string): Promise<void> => {
        await fs.rename(from, to);
    };

    const deleteFile = async (filePath: string): Promise<void> => {
        await fs.rm(filePath, { force: true });
    };

    const removeDirectory = async (dirPath: string): Promise<void> => {
        await fs.rm(dirPath, { recursive: true, force: true });
    };

    const listFiles = async (directory: string, patterns: string[]): Promise<string[]> => {
        const matches = await glob(patterns, {
            cwd: directory,
            nodir: true,
            absolute: true,
            dot: false,
        });
        return matches.sort();
    };

    /** Names of the visible subdirectories, sorted */
    const listDirectories = async (directory: string): Promise<string[]> => {
        const entries = await fs.readdir(directory, { withFileTypes: true });
        return entries
            .filter(entry => entry.isDirectory() && !entry.name.startsWith('.'))
            .map(entry => entry.name)
            .sort();
    };

    return {
        exists,
        isDirectory,
        isDirectoryWritable,
        createDirectory,
        readFile,
        writeFile,
        writeFileAtomic,
        rename,
        deleteFile,
        removeDirectory,
        listFiles,
        listDirectories,
    };
};

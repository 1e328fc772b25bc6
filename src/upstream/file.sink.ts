import fs from 'node:fs/promises';
import path from 'node:path';
import { InvalidArgumentError, NotFoundError } from '../core/errors.js';

export interface FileSink {
    save(bytes: Buffer, outputPath: string): Promise<string>;
}

export interface TextFile {
    content: string;
    /** File name without directory or extension. */
    stem: string;
}

export interface FileSource {
    readText(inputPath: string): Promise<TextFile>;
}

function resolveUnder(baseDir: string, filePath: string, argName: string): string {
    if (filePath.trim() === '') {
        throw new InvalidArgumentError(`${argName} must not be empty`);
    }
    return path.resolve(baseDir, filePath);
}

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'EISDIR');
}

/** Writes downloads to the local filesystem, creating parent directories. */
export class LocalFileSink implements FileSink {
    private baseDir: string;

    constructor(baseDir: string = process.cwd()) {
        this.baseDir = baseDir;
    }

    async save(bytes: Buffer, outputPath: string): Promise<string> {
        const target = resolveUnder(this.baseDir, outputPath, 'output_path');
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, bytes);
        return target;
    }
}

export class LocalFileSource implements FileSource {
    private baseDir: string;

    constructor(baseDir: string = process.cwd()) {
        this.baseDir = baseDir;
    }

    async readText(inputPath: string): Promise<TextFile> {
        const target = resolveUnder(this.baseDir, inputPath, 'file_path');
        let content: string;
        try {
            content = await fs.readFile(target, 'utf-8');
        } catch (err) {
            if (isMissingFile(err)) {
                throw new NotFoundError(`File not found: ${inputPath}`);
            }
            throw err;
        }
        return { content, stem: path.parse(target).name };
    }
}

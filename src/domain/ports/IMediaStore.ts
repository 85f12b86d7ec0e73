/**
 * IMediaStore - content-addressed storage for binary media (audio, clips, renders).
 * Files are written under a temporary name and renamed once complete, so an
 * aborted write never leaves a file at its final path.
 * Implementations: LocalMediaStore
 */
export interface IMediaStore {
    /** Stores bytes under their content hash and returns the file path */
    writeBuffer(data: Buffer, extension: string): Promise<string>;

    /** Downloads a URL (once per URL) and returns the local path */
    download(url: string, extension: string, signal?: AbortSignal): Promise<string>;

    /** Deterministic path for an output keyed by name, e.g. a fingerprint */
    outputPath(name: string, extension: string): string;

    exists(filePath: string): Promise<boolean>;

    remove(filePath: string): Promise<void>;
}

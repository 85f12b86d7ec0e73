export interface MediaInfo {
    durationSeconds: number;
    /** 0 when the file has no video stream */
    width: number;
    height: number;
    /** 0 when the file has no audio stream */
    sampleRate: number;
}

/**
 * IMediaProbe - reads duration and stream properties of a media file.
 * Implementations: FFprobeMediaProbe
 */
export interface IMediaProbe {
    probe(filePath: string): Promise<MediaInfo>;
}

import { CaptionTrack } from '../entities/CaptionSegment';
import { JobConfig, SubtitlesPosition } from '../entities/JobConfig';

/**
 * Burn-in style for the subtitles filter, in ASS terms.
 */
export interface SubtitleStyle {
    fontName: string;
    fontSize: number;
    /** &HAABBGGRR */
    primaryColour: string;
    outlineColour: string;
    outline: number;
    /** ASS numpad alignment: 2 bottom, 5 middle, 8 top */
    alignment: number;
    marginV: number;
}

const ALIGNMENT: Record<SubtitlesPosition, number> = {
    bottom: 2,
    center: 5,
    top: 8,
};

const MARGIN_V: Record<SubtitlesPosition, number> = {
    bottom: 60,
    center: 0,
    top: 60,
};

/**
 * Converts '#RRGGBB' to the ASS '&H00BBGGRR' form.
 */
export function toAssColour(hex: string): string {
    const match = hex.match(/^#([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/);
    if (!match) {
        throw new Error(`Invalid colour: ${hex}`);
    }
    const [, r, g, b] = match;
    return `&H00${`${b}${g}${r}`.toUpperCase()}`;
}

export function buildSubtitleStyle(config: JobConfig): SubtitleStyle {
    return {
        fontName: config.fontName,
        fontSize: config.fontSize,
        primaryColour: toAssColour(config.textColor),
        outlineColour: toAssColour(config.strokeColor),
        outline: config.strokeWidth,
        alignment: ALIGNMENT[config.subtitlesPosition],
        marginV: MARGIN_V[config.subtitlesPosition],
    };
}

/**
 * force_style argument for ffmpeg's subtitles filter.
 */
export function buildForceStyle(style: SubtitleStyle): string {
    return [
        `Fontname=${style.fontName}`,
        `FontSize=${style.fontSize}`,
        `PrimaryColour=${style.primaryColour}`,
        `OutlineColour=${style.outlineColour}`,
        'BorderStyle=1',
        `Outline=${style.outline}`,
        'Shadow=0',
        `Alignment=${style.alignment}`,
        `MarginV=${style.marginV}`,
    ].join(',');
}

/**
 * Formats seconds as an SRT timestamp (HH:MM:SS,mmm).
 */
export function formatSrtTimestamp(seconds: number): string {
    const totalMs = Math.max(0, Math.round(seconds * 1000));
    const ms = totalMs % 1000;
    const totalSeconds = Math.floor(totalMs / 1000);
    const s = totalSeconds % 60;
    const m = Math.floor(totalSeconds / 60) % 60;
    const h = Math.floor(totalSeconds / 3600);
    const pad = (n: number, width: number = 2) => n.toString().padStart(width, '0');
    return `${pad(h)}:${pad(m)}:${pad(s)},${pad(ms, 3)}`;
}

export function toSrt(track: CaptionTrack): string {
    if (track.segments.length === 0) {
        return '';
    }
    const blocks = track.segments.map((segment, i) =>
        `${i + 1}\n${formatSrtTimestamp(segment.startSeconds)} --> ${formatSrtTimestamp(segment.endSeconds)}\n${segment.text}`
    );
    return `${blocks.join('\n\n')}\n`;
}

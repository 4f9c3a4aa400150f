export const FRAMES_DIR_NAME = 'frames';

export const FRAME_FILE_PREFIX = 'frame_';

export const FRAME_EXTENSION = '.png';

// ffmpeg image2 muxer pattern, four-digit sequence numbers
export const FRAME_FILENAME_PATTERN = `${FRAME_FILE_PREFIX}%04d${FRAME_EXTENSION}`;

export const MANIFEST_EXTENSION = '.json';

/**
 * Sampling rate used in frame-count mode when the probed duration is not
 * positive. Changes the number of frames written, so it is always logged.
 */
export const FALLBACK_TARGET_FPS = 1;

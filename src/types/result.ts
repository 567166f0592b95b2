export enum ErrorCode {
    InvalidColor = "INVALID_COLOR",

    // producer / core contract violations
    NegativeTime = "NEGATIVE_TIME",
    NegativeRadius = "NEGATIVE_RADIUS",
    InvalidSlides = "INVALID_SLIDES",
    SegmentRangeOutOfBounds = "SEGMENT_RANGE_OUT_OF_BOUNDS",
    ObjectIndexOutOfBounds = "OBJECT_INDEX_OUT_OF_BOUNDS",
    DrawIndexNotSlider = "DRAW_INDEX_NOT_SLIDER",
    BoxCountMismatch = "BOX_COUNT_MISMATCH",
    TimelineNotSorted = "TIMELINE_NOT_SORTED",
    DigitAtlasIncomplete = "DIGIT_ATLAS_INCOMPLETE",

    Unknown = "UNKNOWN"
}

export type Result<T> = { success: true; data: T } | { success: false; code: ErrorCode; reason: string };

export const ok = <T>(data: T): Result<T> => ({ success: true, data });

export const err = <T>(code: ErrorCode, reason: string): Result<T> => ({
    success: false,
    code,
    reason
});

export const unwrap = <T>(result: Result<T>): T => {
    if (result.success) return result.data;
    throw new Error(`[${result.code}] ${result.reason}`);
};

export const is_ok = <T>(result: Result<T>): result is { success: true; data: T } => {
    return result.success;
};

export const is_err = <T>(result: Result<T>): result is { success: false; code: ErrorCode; reason: string } => {
    return !result.success;
};

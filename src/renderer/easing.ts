export type EasingFunction = (t: number) => number;

export const Easing = {
    None: (t: number) => t,
    Out: (t: number) => 1 - Math.pow(1 - t, 2),
    // squared falloff: 1 at t = 0, 0 at t = 1
    OutFalloff: (t: number) => Math.pow(1 - t, 2)
};

// eased value between `from` and `to`, with the progress clamped to [0, 1]
export const ease_between = (from: number, to: number, t: number, easing: EasingFunction = Easing.None): number => {
    const clamped = Math.min(1, Math.max(0, t));
    return from + (to - from) * easing(clamped);
};

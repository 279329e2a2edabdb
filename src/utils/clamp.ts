export function clamp(value: number, min: number, max: number): number {
    if (Number.isNaN(value)) return min
    return Math.max(min, Math.min(max, value))
}

export function clamp01(value: number): number {
    return clamp(value, 0, 1)
}

/** Exponential smoothing: weight `alpha` on the newest observation */
export function smooth(previous: number, observed: number, alpha: number): number {
    return (1 - alpha) * previous + alpha * observed
}

/** Count of vocabulary entries present as substrings of already-lowercased text */
export function countMatches(lowerText: string, vocabulary: readonly string[]): number {
    return vocabulary.reduce((count, phrase) => count + (lowerText.includes(phrase) ? 1 : 0), 0)
}

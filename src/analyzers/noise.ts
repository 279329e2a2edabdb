/**
 * Noise sources for trait scoring.
 *
 * A NoiseSource returns one zero-mean sample per call. Trait scoring adds a
 * sample to every trait score before clamping, so short texts never yield a
 * perfectly flat signal. Tests inject `zeroNoise` or a seeded source.
 */

export type NoiseSource = () => number

export type RandomSource = () => number

export const zeroNoise: NoiseSource = () => 0

/**
 * mulberry32: small seedable PRNG returning floats in [0,1).
 */
export function seededRandom(seed: number): RandomSource {
    let a = seed >>> 0
    return () => {
        a = (a + 0x6D2B79F5) >>> 0
        let t = a
        t = Math.imul(t ^ (t >>> 15), t | 1)
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296
    }
}

/**
 * Gaussian samples via Box–Muller, scaled by `stddev`.
 */
export function gaussianNoise(stddev: number, random: RandomSource = Math.random): NoiseSource {
    if (stddev <= 0) return zeroNoise
    return () => {
        let u = 0
        while (u === 0) u = random()
        const v = random()
        return stddev * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v)
    }
}

export interface NoiseOptions {
    stddev: number
    seed?: number
}

export function createNoiseSource(opts: NoiseOptions): NoiseSource {
    const random = opts.seed === undefined ? Math.random : seededRandom(opts.seed)
    return gaussianNoise(opts.stddev, random)
}

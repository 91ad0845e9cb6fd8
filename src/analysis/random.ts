/**
 * Seeded pseudo-random source (mulberry32). Same seed, same sequence.
 */
export class SeededRandom {
    private state: number;
    private spare: number | null = null;

    constructor(seed: number) {
        this.state = seed >>> 0;
    }

    /** Uniform in [0, 1) */
    next(): number {
        this.state = (this.state + 0x6d2b79f5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    /** Standard normal via Box–Muller */
    normal(): number {
        if (this.spare !== null) {
            const value = this.spare;
            this.spare = null;
            return value;
        }

        let u = 0;
        while (u === 0) u = this.next();
        const v = this.next();
        const radius = Math.sqrt(-2 * Math.log(u));
        this.spare = radius * Math.sin(2 * Math.PI * v);
        return radius * Math.cos(2 * Math.PI * v);
    }
}

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError, type Commentary } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const commentarySchema = z.object({
    title: z.string().min(1),
    researchArea: z.string(),
    timePeriod: z.string(),
    sections: z.array(
        z.object({
            heading: z.string().min(1),
            items: z.array(z.string()),
        })
    ),
    conclusion: z.string(),
});

/**
 * Generic commentary used when no domain-specific file is configured.
 */
export const DEFAULT_COMMENTARY: Commentary = {
    title: 'Literature Review Report',
    researchArea: 'Not specified',
    timePeriod: 'Not specified',
    sections: [
        {
            heading: 'Research Trends',
            items: [
                'Recurring themes above indicate where the corpus concentrates',
                'Shared references point to the field\'s foundational work',
            ],
        },
        {
            heading: 'Research Gaps',
            items: [
                'Themes carried by few papers may mark under-explored directions',
            ],
        },
        {
            heading: 'Future Directions',
            items: [
                'Extend the corpus and re-run to track how themes shift',
            ],
        },
    ],
    conclusion:
        'The themes and reference statistics above are a statistical summary of the corpus. ' +
        'Read them as pointers for closer reading, not as conclusions.',
};

/**
 * Load and validate a commentary template from a JSON file.
 * Falls back to the defaults when no path is given.
 *
 * @throws ConfigError when the file is unreadable or malformed
 */
export function loadCommentary(path?: string): Commentary {
    if (!path) return DEFAULT_COMMENTARY;

    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
        throw new ConfigError(
            `Cannot read commentary file: ${error instanceof Error ? error.message : String(error)}`,
            path
        );
    }

    const parsed = commentarySchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ConfigError(`Invalid commentary file: ${issues}`, path);
    }

    getLogger().debug({ path, sections: parsed.data.sections.length }, 'Loaded commentary');
    return parsed.data;
}

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { AnalysisReport, ArtifactKind, ArtifactResult, Commentary } from '../types/index.js';
import type { Corpus } from '../storage/corpus.js';
import { renderPapersFile } from '../sources/papers-file.js';
import { getLogger } from '../utils/logger.js';

export const REVIEW_JSON_FILE = 'literature_review.json';
export const NARRATIVE_REPORT_FILE = 'comprehensive_report.md';

// ─── Main Export Functions ───────────────────────────────

/**
 * Write both output artifacts. A failed write is logged and reported in its
 * result; it never throws and never affects the other artifact.
 */
export function writeArtifacts(
    report: AnalysisReport,
    commentary: Commentary,
    outDir: string
): ArtifactResult[] {
    return [
        writeReviewJson(report, outDir),
        writeNarrativeReport(report, commentary, outDir),
    ];
}

/**
 * Write the machine-readable review record.
 */
export function writeReviewJson(report: AnalysisReport, outDir: string): ArtifactResult {
    return writeArtifact('review-json', join(outDir, REVIEW_JSON_FILE), () => renderReviewJson(report));
}

/**
 * Write the narrative markdown report.
 */
export function writeNarrativeReport(
    report: AnalysisReport,
    commentary: Commentary,
    outDir: string
): ArtifactResult {
    return writeArtifact('narrative-report', join(outDir, NARRATIVE_REPORT_FILE), () =>
        renderNarrativeReport(report, commentary)
    );
}

/**
 * Write the extracted papers as a reloadable papers file. Reported like the
 * other artifacts, so a bad path does not stop the analysis.
 */
export function writePapersFile(corpus: Corpus, path: string): ArtifactResult {
    return writeArtifact('papers-file', path, () => renderPapersFile(corpus));
}

function writeArtifact(artifact: ArtifactKind, path: string, render: () => string): ArtifactResult {
    try {
        const content = render();
        mkdirSync(dirname(path), { recursive: true });
        writeFileSync(path, content, 'utf-8');
        getLogger().info({ artifact, path }, 'Artifact written');
        return { ok: true, artifact, path };
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        getLogger().error({ artifact, path, error: message }, 'Failed to write artifact');
        return { ok: false, artifact, path, error: message };
    }
}

// ─── Format Implementations ─────────────────────────────

/**
 * Serialize the report to the review JSON layout.
 */
export function renderReviewJson(report: AnalysisReport): string {
    return JSON.stringify({
        total_papers: report.totalPapers,
        common_themes: report.themes.map((t) => ({
            theme: t.label,
            keywords: t.keywords,
        })),
        reference_analysis: {
            total_references: report.referenceStats.totalReferences,
            common_references: [...report.referenceStats.commonReferences],
            avg_references_per_paper: report.referenceStats.avgReferencesPerPaper,
        },
        papers_summary: report.papersSummary.map((p) => ({
            title: p.title,
            abstract: p.abstract,
        })),
        timestamp: report.timestamp,
    }, null, 2);
}

/**
 * Render the narrative report: data-driven sections first, then the static
 * commentary sections, then the conclusion.
 */
export function renderNarrativeReport(report: AnalysisReport, commentary: Commentary): string {
    const stats = report.referenceStats;
    const common = [...stats.commonReferences];

    let md = `# ${commentary.title}

Generated: ${report.timestamp}

## 1. Overview
- Papers analyzed: ${report.totalPapers}
- Time period: ${commentary.timePeriod}
- Research area: ${commentary.researchArea}

## 2. Common Themes
`;

    if (report.themes.length === 0) {
        md += '\nNo themes could be extracted from this corpus.\n';
    } else {
        for (const theme of report.themes) {
            md += `\n### ${theme.label}\n${bulletList(theme.keywords)}\n`;
        }
    }

    md += `
## 3. Reference Analysis
- Total references: ${stats.totalReferences}
- Average references per paper: ${stats.avgReferencesPerPaper.toFixed(2)}
- References common to every paper: ${common.length}
`;

    if (common.length > 0) {
        md += `\n${bulletList(common)}\n`;
    }

    md += '\n## 4. Paper Summaries\n';
    report.papersSummary.forEach((paper, index) => {
        md += `\n### 4.${index + 1} ${paper.title}\n${paper.abstract}\n`;
    });

    let section = 5;
    for (const { heading, items } of commentary.sections) {
        md += `\n## ${section++}. ${heading}\n${bulletList(items)}\n`;
    }

    md += `\n## ${section}. Conclusion\n${commentary.conclusion}\n`;

    return md;
}

function bulletList(items: readonly string[]): string {
    return items.map((item) => `- ${item}`).join('\n');
}

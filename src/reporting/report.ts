import { ProcessingState, type ProcessingResult } from '../types/index.js';

const TOP_VENUES = 10;

/**
 * Render a plain-text summary of a result set.
 *
 * OA statuses are listed alphabetically. Statuses inferred from an is-OA
 * flag alone count in their bucket and are noted on a separate line.
 * Venues are ranked by count; equal counts keep first-seen order.
 */
export function generateReport(results: readonly ProcessingResult[]): string {
    const total = results.length;
    if (total === 0) {
        return 'No results to report.';
    }

    const completed = results.filter((r) => r.state === ProcessingState.COMPLETED).length;
    const failed = results.filter((r) => r.state === ProcessingState.FAILED).length;

    const oaCounts = new Map<string, number>();
    const venueCounts = new Map<string, number>();
    let approximated = 0;

    for (const { metadata } of results) {
        if (!metadata) continue;
        if (metadata.oa_status) {
            increment(oaCounts, metadata.oa_status);
            if (metadata.oa_status_source === 'approximated') approximated++;
        }
        if (metadata.venue) {
            increment(venueCounts, metadata.venue);
        }
    }

    const lines = [
        'Paper Search Report',
        '='.repeat(40),
        `Total processed: ${total}`,
        `Completed:       ${completed}`,
        `Failed:          ${failed}`,
        `Success rate:    ${Math.round((completed / total) * 100)}%`,
        '',
        'Open Access Breakdown:',
    ];

    for (const [status, count] of [...oaCounts.entries()].sort(([a], [b]) => a.localeCompare(b))) {
        lines.push(`  ${status}: ${count}`);
    }
    if (approximated > 0) {
        lines.push(`  (approx.) ${approximated} inferred from an open-access flag only`);
    }

    if (venueCounts.size > 0) {
        lines.push('', 'Top Venues:');
        const ranked = [...venueCounts.entries()].sort((a, b) => b[1] - a[1]).slice(0, TOP_VENUES);
        for (const [venue, count] of ranked) {
            lines.push(`  ${venue}: ${count}`);
        }
    }

    return lines.join('\n');
}

function increment(counts: Map<string, number>, key: string): void {
    counts.set(key, (counts.get(key) ?? 0) + 1);
}

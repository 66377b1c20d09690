/**
 * Diagnostic runner for the site adapters
 *
 * Usage:
 *   npm run scrape                  # Run every configured site
 *   npm run scrape -- 興雅國中       # Run one site by name
 *   npm run scrape -- --list        # List configured sites
 */

import { loadSettings } from '../config/settings.js';
import { configureLogging } from '../server/logging.js';
import { formatDate } from '../shared/date-normalizer.js';
import { errorMessage } from '../shared/errors.js';
import { describeTraceEntry, traceSeverity } from '../shared/trace.js';
import type { BriefingResult, TraceSeverity } from '../types/index.js';
import { runAllSites, runSingleSite } from './index.js';
import { getSiteConfig, loadSiteConfigs } from './site-config.js';

const BADGES: Record<TraceSeverity, string> = {
    success: '\x1b[32m[OK]\x1b[0m  ',
    info: '\x1b[36m[..]\x1b[0m  ',
    warning: '\x1b[33m[!!]\x1b[0m  ',
    error: '\x1b[31m[ERR]\x1b[0m '
};

async function main(): Promise<void> {
    const args = process.argv.slice(2);
    const settings = loadSettings();
    configureLogging({ level: settings.logLevel, file: settings.logFile });

    const sites = loadSiteConfigs(settings.sitesFile);

    if (args.includes('--list')) {
        console.log('Configured sites:\n');
        for (const site of sites) {
            console.log(`  ${site.name.padEnd(12)} ${site.adapter.padEnd(8)} ${site.listingUrl}`);
        }
        return;
    }

    const options = {
        keywords: settings.keywords,
        maxAgeDays: settings.maxAgeDays,
        maxPages: settings.maxPages,
        timeoutMs: settings.timeoutMs
    };

    const nameArg = args.find(a => !a.startsWith('--'));
    let result: BriefingResult;
    if (nameArg) {
        const site = getSiteConfig(sites, nameArg);
        if (!site) {
            throw new Error(`No site named "${nameArg}" in ${settings.sitesFile}`);
        }
        result = await runSingleSite(site, options);
    } else {
        result = await runAllSites(sites, options);
    }

    printResult(result);
}

function printResult(result: BriefingResult): void {
    console.log('\n========================================');
    console.log(`  ${result.announcements.length} announcement(s)`);
    console.log('========================================\n');

    for (const item of result.announcements) {
        const date = item.resolvedDate ? formatDate(item.resolvedDate) : item.rawDate;
        console.log(`  ${date}  [${item.site}] ${item.title}`);
        console.log(`              ${item.url}`);
    }

    for (const trace of result.traces) {
        const stats = result.stats.find(s => s.site === trace.site);
        console.log(`\n--- ${trace.site}${stats ? ` (${stats.accepted}/${stats.candidates} kept, ${stats.durationMs}ms)` : ''}`);
        for (const entry of trace.entries) {
            console.log(`  ${BADGES[traceSeverity(entry)]}${describeTraceEntry(entry)}`);
        }
    }
}

main().catch(err => {
    console.error('Fatal error:', errorMessage(err));
    process.exit(1);
});

/**
 * Security Status Validation CLI
 *
 * Detects stale prices in the price table, classifies each stale security
 * and writes the validation report that purge-delisted --from-report reads.
 *
 * Usage:
 *   npx tsx scripts/validate-securities.ts
 *   npx tsx scripts/validate-securities.ts --source=prices_eod
 */

import 'dotenv/config';
import { config } from '../lib/config';
import { closeDb } from '../lib/db';
import { handleError } from '../lib/errors';
import { logger } from '../lib/logger';
import { parseValidateArgs, VALIDATE_USAGE } from '../lib/purge/cli-args';
import { connectPriceArchiveStore } from '../lib/purge/connect';
import type { ValidationReport } from '../lib/purge/validation-report';
import { buildValidationReport, writeValidationReport } from '../services/security-validation.service';
import { StalePriceService, writeStalePriceReport, type StalePriceReport } from '../services/stale-price.service';

const STATUS_EMOJI: Record<string, string> = {
    DELISTED: '🔴',
    SUSPENDED: '🟠',
    AT_RISK: '🟡',
    SUSPICIOUS: '🔵',
    MONITOR: '🟢',
    ACTIVE: '✅',
    ERROR: '❌',
};

function printSummary(stale: StalePriceReport, validation: ValidationReport) {
    console.log('\n' + '='.repeat(60));
    console.log('  🔍 STALE PRICE DETECTION');
    console.log('='.repeat(60));
    console.log(`   Securities with stale prices: ${stale.summary.totalStale}`);
    console.log(`   High risk:   ${stale.summary.highRisk}`);
    console.log(`   Medium risk: ${stale.summary.mediumRisk}`);
    console.log(`   Low risk:    ${stale.summary.lowRisk}`);

    if (stale.securities.length > 0) {
        console.log('\n   Top concerns:');
        stale.securities.slice(0, 10).forEach((security, i) => {
            console.log(
                `   ${String(i + 1).padStart(2)}. ${security.symbol} - $${security.price.toFixed(4)} ` +
                    `(${security.consecutiveDays} days, ${security.riskLevel} risk)`
            );
        });
    }

    console.log('\n📊 Validation results:');
    for (const result of validation.results) {
        console.log(`   ${STATUS_EMOJI[result.status] ?? '❔'} ${result.symbol}: ${result.status} - ${result.reason ?? ''}`);
    }
    console.log('');
}

async function main(): Promise<number> {
    const options = parseValidateArgs(process.argv.slice(2));
    if (options.help) {
        console.log(VALIDATE_USAGE);
        return 0;
    }

    const sourceTable = options.sourceTable ?? config.purge.sourceTable;
    const now = new Date();

    const store = await connectPriceArchiveStore();
    const stale = await new StalePriceService(store).detect(sourceTable, now);
    await writeStalePriceReport(config.files.staleReport, stale);

    const validation = buildValidationReport(stale.securities, config.validation.knownDelisted, now);
    await writeValidationReport(config.files.validationReport, validation);

    printSummary(stale, validation);
    console.log(`💾 Stale price report: ${config.files.staleReport}`);
    console.log(`💾 Validation report:  ${config.files.validationReport}`);
    return 0;
}

async function run() {
    try {
        process.exitCode = await main();
    } catch (error) {
        const report = handleError(error);
        console.error(`\n❌ ${report.code}: ${report.message}\n`);
        process.exitCode = report.exitCode;
    } finally {
        await closeDb();
    }
}

run().catch((error: unknown) => {
    logger.fatal({ err: error }, 'Failed to close the database pool');
    process.exitCode = 1;
});

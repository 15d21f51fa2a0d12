/**
 * Delisted Securities Purge CLI
 *
 * Backs up every price row of the given symbols into the backup table and,
 * with --yes, deletes them from the source table in the same transaction.
 *
 * Usage:
 *   npx tsx scripts/purge-delisted.ts IPG CRCW              # backup only
 *   npx tsx scripts/purge-delisted.ts --symbols=IPG,CRCW --yes
 *   npx tsx scripts/purge-delisted.ts --from-report --yes
 *   npx tsx scripts/purge-delisted.ts --from-report --emit-sql=data/cleanup_script.sql
 */

import 'dotenv/config';
import { config } from '../lib/config';
import { closeDb } from '../lib/db';
import { handleError } from '../lib/errors';
import { logger } from '../lib/logger';
import { parsePurgeArgs, USAGE } from '../lib/purge/cli-args';
import { connectPriceArchiveStore } from '../lib/purge/connect';
import { runPurgeCommand } from '../services/purge-command.service';
import { PurgeState, type PurgeResult } from '../services/purge.service';
import { RemovalLogService } from '../services/removal-log.service';

function printSummary(result: PurgeResult) {
    console.log('\n' + '='.repeat(60));
    console.log('  🔧 DELISTED SECURITIES PURGE');
    console.log('='.repeat(60));
    console.log(`   Source table:  ${result.sourceTable}`);
    console.log(`   Backup table:  ${result.backupTable}${result.backupCreated ? ' (created)' : ''}`);
    console.log(`   Symbols:       ${result.symbols.join(', ')}`);
    console.log(`   Rows matched:  ${result.matched}`);
    console.log(`   Rows backed up (new): ${result.backedUp}`);
    console.log(`   Rows deleted:  ${result.deleted}`);

    if (result.remaining) {
        console.log('\n📈 Statistics after cleanup:');
        console.log(`   Remaining records:    ${result.remaining.remainingRecords}`);
        console.log(`   Remaining securities: ${result.remaining.remainingSecurities}`);
    }

    if (result.state === PurgeState.BACKED_UP) {
        console.log('\n⚠️  Backup only. Review the backup table, then re-run with --yes to delete.');
    } else {
        console.log('\n✅ Purge complete.');
    }
    console.log('');
}

async function main(): Promise<number> {
    const options = parsePurgeArgs(process.argv.slice(2));
    if (options.help) {
        console.log(USAGE);
        return 0;
    }

    const outcome = await runPurgeCommand(
        options,
        {
            sourceTable: config.purge.sourceTable,
            backupTable: config.purge.backupTable,
            validationReportPath: config.files.validationReport,
        },
        {
            openStore: connectPriceArchiveStore,
            removalLog: new RemovalLogService(config.files.removalLog),
        }
    );

    if (outcome.kind === 'script') {
        if (outcome.path === null) {
            process.stdout.write(outcome.script);
        } else {
            console.log(`📄 SQL cleanup script saved to: ${outcome.path}`);
        }
        return 0;
    }

    printSummary(outcome.result);
    if (outcome.result.state === PurgeState.PURGED) {
        const added = outcome.logged.length;
        console.log(`📝 Removal log: ${added} new entr${added === 1 ? 'y' : 'ies'} (${config.files.removalLog})`);
    }

    return 0;
}

async function run() {
    try {
        process.exitCode = await main();
    } catch (error) {
        const report = handleError(error);
        console.error('');
        console.error(`❌ ${report.code}: ${report.message}`);
        if (report.details) {
            console.error(`   Details: ${JSON.stringify(report.details)}`);
        }
        console.error('');
        process.exitCode = report.exitCode;
    } finally {
        await closeDb();
    }
}

run().catch((error: unknown) => {
    logger.fatal({ err: error }, 'Failed to close the database pool');
    process.exitCode = 1;
});

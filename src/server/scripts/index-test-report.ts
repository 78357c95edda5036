#!/usr/bin/env tsx
/**
 * Index Test Report
 *
 * Parses a pytest-html report and uploads one index document per test case.
 *
 * Usage:
 *   tsx src/server/scripts/index-test-report.ts <report> [options]
 *
 * Arguments:
 *   <report>                 Path or http(s) URL of the report HTML
 *
 * Options:
 *   --dry-run                Parse and build, but keep documents in memory
 *   --print                  Print the built documents as JSON
 *   --processed-by=<name>    Override REPORT_PROCESSED_BY
 *   --processed-at=<time>    Override REPORT_PROCESSED_AT ("YYYY-MM-DD HH:MM:SS" or ISO 8601)
 */

import { fileURLToPath } from 'url';
import { getEnv } from '../config/env.js';
import { closeDB, connectDB } from '../config/database.js';
import { createProcessingContext } from '../config/processingContext.js';
import { ReportParser } from '../extraction/report/index.js';
import { IndexDocumentBuilder } from '../etl/transformers/IndexDocumentBuilder.js';
import { InMemoryIndexDocumentSink, MongoIndexDocumentSink, type IndexDocumentSink } from '../etl/loaders/index.js';
import { ReportIndexPipeline } from '../etl/pipelines/reportIndexPipeline.js';
import { isOperationalError, toAppError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

export interface IndexReportArgs {
    report: string;
    dryRun: boolean;
    print: boolean;
    processedBy?: string;
    processedAt?: string;
}

function readOption(args: string[], name: string): string | undefined {
    const prefix = `--${name}=`;
    const match = args.find(arg => arg.startsWith(prefix));
    if (match === undefined) return undefined;
    const value = match.slice(prefix.length).trim();
    return value || undefined;
}

/**
 * Parse command-line arguments; returns null when no report is given
 */
export function parseIndexReportArgs(argv: string[]): IndexReportArgs | null {
    const report = argv.find(arg => !arg.startsWith('--'));
    if (!report) return null;
    return {
        report,
        dryRun: argv.includes('--dry-run'),
        print: argv.includes('--print'),
        processedBy: readOption(argv, 'processed-by'),
        processedAt: readOption(argv, 'processed-at'),
    };
}

function printUsage(): void {
    console.error('Usage: tsx src/server/scripts/index-test-report.ts <report> [--dry-run] [--print] [--processed-by=<name>] [--processed-at=<time>]');
}

async function main(): Promise<void> {
    const args = parseIndexReportArgs(process.argv.slice(2));
    if (!args) {
        printUsage();
        process.exitCode = 1;
        return;
    }

    try {
        const env = getEnv();
        const context = createProcessingContext(env, {
            processedBy: args.processedBy,
            processedAt: args.processedAt,
        });

        let sink: IndexDocumentSink;
        if (args.dryRun) {
            sink = new InMemoryIndexDocumentSink('dry-run');
        } else {
            const db = await connectDB();
            const mongoSink = MongoIndexDocumentSink.fromDb(db, env.REPORT_INDEX_COLLECTION);
            await mongoSink.ensureIndexes();
            sink = mongoSink;
        }

        const pipeline = new ReportIndexPipeline({
            parser: new ReportParser(context),
            builder: new IndexDocumentBuilder(),
            sink,
            loadOptions: { timeoutMs: env.REPORT_FETCH_TIMEOUT_MS },
        });

        const result = await pipeline.run(args.report);

        if (args.print) {
            console.log(JSON.stringify(result.documents, null, 2));
        }

        console.log(`\n📄 ${result.title} (${result.source})`);
        console.log('─'.repeat(50));
        console.log(`Environment:    ${result.environmentSource}${result.fallbackReason ? ` (${result.fallbackReason})` : ''}`);
        console.log(`Documents:      ${result.documentCount}`);
        console.log(`Target:         ${result.upload.target}${args.dryRun ? ' (dry run)' : ''}`);
        console.log(`Inserted:       ${result.upload.inserted}`);
        console.log(`Updated:        ${result.upload.updated}`);
        console.log('');
    } catch (error) {
        const appError = toAppError(error);
        logger.error({ code: appError.code, context: appError.context, error }, 'Report indexing failed');
        if (isOperationalError(appError)) {
            console.error(`❌ ${appError.message}`);
        } else {
            console.error('❌ Error:', error);
        }
        process.exitCode = 1;
    } finally {
        await closeDB();
    }
}

// Run if called directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
    main().catch(console.error);
}

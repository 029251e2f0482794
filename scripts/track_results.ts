import dotenv from 'dotenv';
import { loadConfig } from '../src/config/env';
import { logger } from '../src/lib/resilience';
import { buildResultsReport, parseResultsArgs, runResultsTracker } from '../src/services/resultsTracker';

dotenv.config();

async function main() {
    const options = parseResultsArgs(process.argv.slice(2));
    const config = loadConfig();
    logger.setLevel(config.logLevel);

    const { summary } = await runResultsTracker({ config, log: logger }, options);
    console.log(buildResultsReport(summary).join('\n'));
}

main().catch((e: unknown) => {
    console.error('❌ Results tracker failed:', e instanceof Error ? e.message : e);
    process.exit(1);
});

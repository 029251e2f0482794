import dotenv from 'dotenv';
import { loadConfig } from '../src/config/env';
import { logger } from '../src/lib/resilience';
import { buildReport, parseScanArgs } from '../src/services/scanRunner';
import { runScheduledScan } from '../src/services/scheduler';

dotenv.config();

async function main() {
    const options = parseScanArgs(process.argv.slice(2));
    const config = loadConfig();
    logger.setLevel(config.logLevel);

    const { scan } = await runScheduledScan({ config, log: logger }, options);
    if (scan) console.log(buildReport(scan).join('\n'));
}

main().catch((e: unknown) => {
    console.error('❌ Scheduler failed:', e instanceof Error ? e.message : e);
    process.exit(1);
});

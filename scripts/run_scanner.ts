import dotenv from 'dotenv';
import { loadConfig } from '../src/config/env';
import { logger } from '../src/lib/resilience';
import { buildReport, parseScanArgs, runScan } from '../src/services/scanRunner';

dotenv.config();

async function main() {
    const options = parseScanArgs(process.argv.slice(2));
    const config = loadConfig();
    logger.setLevel(config.logLevel);

    const report = await runScan({ config, log: logger }, options);
    console.log(buildReport(report).join('\n'));
}

main().catch((e: unknown) => {
    console.error('❌ Scanner failed:', e instanceof Error ? e.message : e);
    process.exit(1);
});

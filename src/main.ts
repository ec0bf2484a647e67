import 'dotenv/config';
import { runCLI } from '@/cli';

runCLI().catch((error: unknown) => {
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
});

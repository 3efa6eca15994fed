import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { handler } from '../src/handler';

async function main() {
  const file = resolve(process.argv[2] ?? resolve(__dirname, 'sample-invocation.json'));
  const invocation: unknown = JSON.parse(await readFile(file, 'utf8'));
  const response = await handler(invocation);

  process.stdout.write(`${JSON.stringify(response, null, 2)}\n`);
  if (response.status === 'error') {
    process.exitCode = 1;
  }
}

main().catch((err) => {
  process.stderr.write(`${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
  process.exitCode = 1;
});

#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { DeployerClient } from './client.js';

const API = process.env.DEPLOYER_API ?? 'http://localhost:8000';

function usage(): void {
  console.log(`deployer CLI

Usage:
  deployer status
  deployer submit --file <task.json>

Env:
  DEPLOYER_API=http://localhost:8000
`);
}

function getFlag(args: string[], name: string): string | undefined {
  const i = args.indexOf(name);
  if (i === -1) return undefined;
  return args[i + 1];
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (args.length === 0) return usage();

  const [a] = args;
  const client = new DeployerClient(API);

  if (a === 'status') {
    const r = await client.status();
    console.log(JSON.stringify(r.data, null, 2));
    process.exit(r.status >= 400 ? 1 : 0);
  }

  if (a === 'submit') {
    const file = getFlag(args, '--file');
    if (!file) return usage();
    const body: unknown = JSON.parse(await readFile(file, 'utf8'));
    const r = await client.submit(body);
    console.log(JSON.stringify(r.data, null, 2));
    process.exit(r.status >= 400 ? 1 : 0);
  }

  usage();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

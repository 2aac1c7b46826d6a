#!/usr/bin/env -S node --import tsx
import { hideBin } from 'yargs/helpers';
import { runCli } from './cli.ts';

await runCli(hideBin(process.argv));

#!/usr/bin/env node
import { run } from 'cmd-ts';
import { cmd } from './commands/index';
import { Tracer } from './tracer';

const args = process.argv.slice(2);
// Without a command print the usage rather than an error
Tracer.run(() => run(cmd, args.length === 0 ? ['--help'] : args)).catch((err) => {
  console.error(err);
  process.exitCode = 1;
});

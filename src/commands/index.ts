import { subcommands } from 'cmd-ts';
import { getVersion } from '../version';
import { commandInstall } from './install';
import { commandRun } from './run';

export const cmd = subcommands({
  name: 'zoo',
  description: 'Install models, git repositories and downloads described in a zoo.yaml, and run its scripts',
  version: getVersion().version ?? 'unknown',
  cmds: { install: commandInstall, run: commandRun },
});

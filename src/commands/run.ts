import { command, optional, positional, string } from 'cmd-ts';
import { logger, setVerbose } from '../log';
import { ManifestLoader } from '../manifest.loader';
import { runScript } from '../script';
import { Tracer } from '../tracer';
import { file, verbose } from './common';

export const commandRun = command({
  name: 'run',
  description: 'Run a script from the manifest',
  args: {
    verbose,
    file,
    script: positional({ type: optional(string), displayName: 'SCRIPT', description: 'Name of the script to run' }),
  },
  handler: (args) => {
    return Tracer.startRootSpan('command:run', async (span) => {
      setVerbose(args.verbose);
      const manifest = await ManifestLoader.load(args.file, logger);
      const exitCode = await runScript(manifest, args.script, logger);
      span.setAttribute('script', args.script ?? '');
      span.setAttribute('exitCode', exitCode);
      process.exitCode = exitCode;
    });
  },
});

import { boolean, command, flag } from 'cmd-ts';
import { FetchHttpClient } from '../clients/http.client';
import { SimpleGitClient } from '../clients/git.client';
import { HuggingFaceHubClient } from '../clients/hub.client';
import { readConfig, ZooConfig } from '../config';
import { install, InstallDeps } from '../install';
import { logger, setVerbose } from '../log';
import { ManifestLoader } from '../manifest.loader';
import { Tracer } from '../tracer';
import { concurrency, file, verbose } from './common';

/** Clients an install talks to, built from the environment */
export const InstallClients = {
  create(cfg: ZooConfig): InstallDeps {
    return {
      logger,
      hub: new HuggingFaceHubClient({ accessToken: cfg.hubToken, cacheDir: cfg.hubCacheDir }),
      git: new SimpleGitClient(),
      http: FetchHttpClient,
    };
  },
};

export const commandInstall = command({
  name: 'install',
  description: 'Install the resources listed in the manifest',
  args: {
    verbose,
    file,
    concurrency,
    noSymlinks: flag({
      long: 'no-symlinks',
      type: boolean,
      defaultValue: () => false,
      description: 'Copy hub files into place instead of linking them to the hub cache',
    }),
  },
  handler: (args) => {
    return Tracer.startRootSpan('command:install', async (span) => {
      setVerbose(args.verbose);
      const cfg = readConfig();
      const manifest = await ManifestLoader.load(args.file, logger);

      const summary = await install(
        manifest,
        { noSymlinks: args.noSymlinks, concurrency: args.concurrency },
        InstallClients.create(cfg),
      );

      span.setAttribute('manifest', manifest.name);
      span.setAttribute('total', summary.total);
      span.setAttribute('count', summary.count);
      // A halted run has already logged its warning and partial summary
      span.setAttribute('halted', summary.halted);
      return summary;
    });
  },
});

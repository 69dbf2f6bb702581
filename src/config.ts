/** Settings read from the environment once at startup */
export interface ZooConfig {
  /** Access token for gated or private hub repositories */
  hubToken?: string;
  /** Directory the hub library keeps its content addressed cache in */
  hubCacheDir?: string;
  telemetry: { endpoint?: string; token?: string; disabled: boolean };
}

function env(name: string, e: NodeJS.ProcessEnv): string | undefined {
  const value = e[name];
  if (value == null || value.trim() === '') return undefined;
  return value;
}

export function readConfig(e: NodeJS.ProcessEnv = process.env): ZooConfig {
  const hfHome = env('HF_HOME', e);
  return {
    hubToken: env('HF_TOKEN', e) ?? env('HUGGING_FACE_HUB_TOKEN', e),
    hubCacheDir: env('HF_HUB_CACHE', e) ?? (hfHome == null ? undefined : `${hfHome}/hub`),
    telemetry: {
      endpoint: env('ZOO_TELEMETRY_ENDPOINT', e),
      token: env('ZOO_TELEMETRY_TOKEN', e),
      disabled: e['TELEMETRY_DISABLED'] != null,
    },
  };
}

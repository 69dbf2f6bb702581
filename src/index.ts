export * from './errors';
export * from './filename';
export * from './install';
export * from './manifest';
export { ManifestLoader, ValidationResult } from './manifest.loader';
export { runScript } from './script';
export { GitClient, SimpleGitClient } from './clients/git.client';
export { HttpClient, FetchHttpClient } from './clients/http.client';
export { HubClient, HuggingFaceHubClient } from './clients/hub.client';
export { FetchResult, InstallContext } from './fetch/types';

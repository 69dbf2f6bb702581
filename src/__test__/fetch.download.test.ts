import { promises as fs } from 'fs';
import o from 'ospec';
import * as path from 'path';
import { DownloadError } from '../errors';
import { downloadFileName, fetchDownload, Hints, UserAgent } from '../fetch/download';
import { FetchResult } from '../fetch/types';
import { DownloadResource } from '../manifest';
import { FakeHttp, makeContext, makeTempDir } from './fakes';

const Src = 'https://example.test/images/skull.svg';
const Svg = '<svg xmlns="http://www.w3.org/2000/svg"/>';

function failure(result: FetchResult): DownloadError {
  if (result.status !== 'failed') throw new Error(`Expected a failure, got ${result.status}`);
  if (!(result.error instanceof DownloadError)) throw new Error('Expected a DownloadError');
  return result.error;
}

o.spec('downloadFileName', () => {
  o('should slugify the last segment of the source', () => {
    o(downloadFileName(Src)).equals('skullsvg');
    o(downloadFileName('https://example.test/api/download/models/369718?type=Model&format=PickleTensor')).equals(
      '369718typemodelformatpickletensor',
    );
  });
});

o.spec('fetchDownload', () => {
  o.specTimeout(5000);
  let tmp: string;
  let http: FakeHttp;

  const resource = (extra: Partial<DownloadResource> = {}): DownloadResource => ({
    group: 'downloads',
    name: 'skull',
    src: Src,
    type: 'download',
    installTo: tmp,
    ...extra,
  });

  o.beforeEach(async () => {
    tmp = await makeTempDir();
    http = new FakeHttp();
  });

  o.afterEach(async () => {
    await fs.rm(tmp, { recursive: true, force: true });
  });

  o('should download and rename a file', async () => {
    http.on(Src, Svg, { headers: { 'content-type': 'image/svg+xml' } });

    const result = await fetchDownload(resource({ renameTo: 'out.svg' }), tmp, makeContext({ http }));

    o(result).deepEquals({ status: 'installed', path: path.join(tmp, 'out.svg') });
    o(await fs.readdir(tmp)).deepEquals(['out.svg']);
    o(await fs.readFile(path.join(tmp, 'out.svg'), 'utf8')).equals(Svg);
  });

  o('should store the file under the slugified source name', async () => {
    http.on(Src, Svg, { headers: { 'content-type': 'image/svg+xml' } });

    const result = await fetchDownload(resource(), tmp, makeContext({ http }));

    o(result).deepEquals({ status: 'installed', path: path.join(tmp, 'skullsvg') });
    o(http.requests).deepEquals([{ url: Src, headers: { 'User-Agent': UserAgent } }]);
  });

  o('should use the file name from Content-Disposition', async () => {
    const src = 'https://example.test/api/download/models/369718';
    http.on(src, 'binary', {
      headers: { 'content-type': 'application/octet-stream', 'content-disposition': 'attachment; filename="model.safetensors"' },
    });

    const result = await fetchDownload(resource({ src }), tmp, makeContext({ http }));

    o(result).deepEquals({ status: 'installed', path: path.join(tmp, 'model.safetensors') });
    o(await fs.readdir(tmp)).deepEquals(['model.safetensors']);
  });

  o('should send the api key as a bearer token', async () => {
    http.on(Src, Svg);

    await fetchDownload(resource({ apiKey: 'test-key' }), tmp, makeContext({ http }));

    o(http.requests[0].headers).deepEquals({ 'User-Agent': UserAgent, Authorization: 'Bearer test-key' });
  });

  o('should ignore a revision', async () => {
    http.on(Src, Svg);

    const result = await fetchDownload(resource({ revision: 'main' }), tmp, makeContext({ http }));

    o(result.status).equals('installed');
  });

  o('should skip when the file already exists', async () => {
    await fs.writeFile(path.join(tmp, 'skullsvg'), 'existing');

    const result = await fetchDownload(resource(), tmp, makeContext({ http }));

    o(result).deepEquals({ status: 'skipped', path: path.join(tmp, 'skullsvg') });
    o(http.requests.length).equals(0);
    o(await fs.readFile(path.join(tmp, 'skullsvg'), 'utf8')).equals('existing');
  });

  o('should skip when the renamed file already exists', async () => {
    await fs.writeFile(path.join(tmp, 'out.svg'), 'existing');

    const result = await fetchDownload(resource({ renameTo: 'out.svg' }), tmp, makeContext({ http }));

    o(result).deepEquals({ status: 'skipped', path: path.join(tmp, 'out.svg') });
    o(http.requests.length).equals(0);
  });

  o('should never save a web page', async () => {
    http.on(Src, '<html><body>Sign in</body></html>', { headers: { 'content-type': 'text/html; charset=utf-8' } });

    const error = failure(await fetchDownload(resource({ renameTo: 'out.svg' }), tmp, makeContext({ http })));

    o(error.reason).equals('html');
    o(error.hint).equals(Hints.html);
    o(await fs.readdir(tmp)).deepEquals([]);
  });

  o('should fail on an error status with a hint for refused requests', async () => {
    http.on(Src, 'denied', { status: 403, statusText: 'Forbidden' });

    const error = failure(await fetchDownload(resource(), tmp, makeContext({ http })));

    o(error.reason).equals('status');
    o(error.status).equals(403);
    o(error.hint).equals(Hints.auth);
    o(error.message).equals('Server responded with 403 Forbidden (downloads/skull)');
    o(await fs.readdir(tmp)).deepEquals([]);
  });

  o('should fail on a missing file without a hint', async () => {
    http.on(Src, 'missing', { status: 404, statusText: 'Not Found' });

    const error = failure(await fetchDownload(resource(), tmp, makeContext({ http })));

    o(error.reason).equals('status');
    o(error.hint).equals(undefined);
  });

  o('should turn network errors into a failed result', async () => {
    const error = failure(await fetchDownload(resource(), tmp, makeContext({ http })));

    o(error.reason).equals('network');
    o(error.message).equals('Error downloading file: fetch failed (downloads/skull)');
  });

  o('should report write failures', async () => {
    http.on(Src, Svg);
    const missing = path.join(tmp, 'not-created');

    const error = failure(await fetchDownload(resource({ installTo: missing }), missing, makeContext({ http })));

    o(error.reason).equals('write');
    o(error.message.startsWith('Error writing file:')).equals(true);
  });
});

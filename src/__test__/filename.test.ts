import o from 'ospec';
import { filenameFromHeaders, formatSize, repoNameFromSrc, slugify, splitHubSource } from '../filename';

o.spec('slugify', () => {
  o('should lowercase and hyphenate', () => {
    o(slugify('Hello World')).equals('hello-world');
    o(slugify('  many   spaces -- and dashes ')).equals('many-spaces-and-dashes');
  });

  o('should drop characters that are not safe in file names', () => {
    o(slugify('skull.svg')).equals('skullsvg');
    o(slugify('369718?type=Model&format=PickleTensor')).equals('369718typemodelformatpickletensor');
  });

  o('should strip accents and non ascii characters', () => {
    o(slugify('Ünïcode Model v2.safetensors')).equals('unicode-model-v2safetensors');
    o(slugify('東京 model')).equals('model');
  });

  o('should keep unicode letters when allowed', () => {
    o(slugify('Ünïcode Modèl', true)).equals('ünïcode-modèl');
    // x has no precomposed form with an acute accent so the mark stays separate after NFKC
    o(slugify('x\u0301y model', true)).equals('xy-model');
  });

  o('should trim leading and trailing hyphens and underscores', () => {
    o(slugify('--_a b_--')).equals('a-b');
    o(slugify('__init__')).equals('init');
    o(slugify('snake_case_name')).equals('snake_case_name');
  });

  o('should handle empty input', () => {
    o(slugify('')).equals('');
    o(slugify('...')).equals('');
  });

  o('should be idempotent and only produce safe characters', () => {
    const inputs = ['Hello World', '--_a b_--', 'Ünïcode Model v2.safetensors', 'a -_ b', '_-x-_', 'ÀÉÎõü 123'];
    for (const input of inputs) {
      const once = slugify(input);
      o(slugify(once)).equals(once)(`slugify(${input})`);
      o(/^[a-z0-9_-]*$/.test(once)).equals(true)(`charset of ${once}`);
      o(/^[-_]|[-_]$/.test(once)).equals(false)(`ends of ${once}`);
    }
  });
});

o.spec('filenameFromHeaders', () => {
  o('should be undefined without Content-Disposition', () => {
    o(filenameFromHeaders(new Headers({ 'content-type': 'application/octet-stream' }))).equals(undefined);
    o(filenameFromHeaders(new Headers({ 'content-disposition': 'attachment' }))).equals(undefined);
  });

  o('should read quoted and unquoted file names', () => {
    const quoted = new Headers({ 'content-disposition': 'attachment; filename="model.safetensors"' });
    o(filenameFromHeaders(quoted)).equals('model.safetensors');
    const plain = new Headers({ 'content-disposition': 'attachment; filename=plain.bin' });
    o(filenameFromHeaders(plain)).equals('plain.bin');
    const trailing = new Headers({ 'content-disposition': 'attachment; filename="a.bin"; size=3' });
    o(filenameFromHeaders(trailing)).equals('a.bin');
  });

  o('should prefer the extended file name', () => {
    const headers = new Headers({
      'content-disposition': `attachment; filename*=UTF-8''na%C3%AFve%20file.bin; filename="fallback.bin"`,
    });
    o(filenameFromHeaders(headers)).equals('naïve file.bin');
  });

  o('should never return a path outside the target folder', () => {
    const traversal = new Headers({ 'content-disposition': 'attachment; filename="../../etc/passwd"' });
    o(filenameFromHeaders(traversal)).equals('passwd');
    const dots = new Headers({ 'content-disposition': 'attachment; filename=".."' });
    o(filenameFromHeaders(dots)).equals(undefined);
  });
});

o.spec('repoNameFromSrc', () => {
  o('should strip the .git suffix', () => {
    o(repoNameFromSrc('https://github.com/example/tool.git')).equals('tool');
  });

  o('should use the last path segment', () => {
    o(repoNameFromSrc('https://github.com/example/tool')).equals('tool');
    o(repoNameFromSrc('https://github.com/example/tool/')).equals('tool');
  });
});

o.spec('splitHubSource', () => {
  o('should split repository and file path', () => {
    o(splitHubSource('owner/repo/sub/file.bin')).deepEquals({
      repoId: 'owner/repo',
      repoFilePath: 'sub/file.bin',
      repoFileName: 'file.bin',
    });
  });

  o('should reject sources without a file', () => {
    o(splitHubSource('owner/repo')).equals(null);
    o(splitHubSource('owner//file.bin')).equals(null);
  });
});

o.spec('formatSize', () => {
  o('should pick a readable unit', () => {
    o(formatSize(512)).equals('512 bytes');
    o(formatSize(1536)).equals('1.5 KB');
    o(formatSize(5 * 1024 * 1024)).equals('5 MB');
    o(formatSize(3 * 1024 * 1024 * 1024)).equals('3 GB');
  });
});

import { describe, it, expect, vi, beforeEach } from 'vitest';
import path from 'path';
import fs from 'fs/promises';
import { writeArtifacts } from '../../../src/lib/emitter/artifact-writer.js';
import type { Artifact } from '../../../src/lib/emitter/types.js';
import { FileIOError } from '../../../src/utils/errors.js';

vi.mock('fs/promises');
vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
  },
}));

describe('artifact-writer', () => {
  const outputDir = '/tmp/specgen-out';
  const artifacts: Artifact[] = [
    { kind: 'declarations', fileName: 'types.h', content: 'namespace Lsp {\n}\n' },
    { kind: 'bindings', fileName: 'types_json.h', content: '// é\n' },
  ];

  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(fs.mkdir).mockResolvedValue(undefined);
    vi.mocked(fs.writeFile).mockResolvedValue(undefined);
  });

  it('should create the output directory and write each artifact', async () => {
    const written = await writeArtifacts(artifacts, outputDir);

    expect(fs.mkdir).toHaveBeenCalledWith(outputDir, { recursive: true });
    expect(fs.writeFile).toHaveBeenCalledTimes(2);
    expect(fs.writeFile).toHaveBeenNthCalledWith(
      1,
      path.resolve(outputDir, 'types.h'),
      'namespace Lsp {\n}\n',
      'utf-8',
    );
    expect(written).toEqual([
      { kind: 'declarations', path: path.resolve(outputDir, 'types.h'), bytes: 18 },
      { kind: 'bindings', path: path.resolve(outputDir, 'types_json.h'), bytes: 6 },
    ]);
  });

  it('should raise a file error when the directory cannot be created', async () => {
    vi.mocked(fs.mkdir).mockRejectedValue(new Error('EACCES'));

    await expect(writeArtifacts(artifacts, outputDir)).rejects.toThrow(
      'Failed to create output directory: /tmp/specgen-out',
    );
    expect(fs.writeFile).not.toHaveBeenCalled();
  });

  it('should stop at the first failed write', async () => {
    vi.mocked(fs.writeFile).mockRejectedValueOnce(new Error('ENOSPC'));

    const result = writeArtifacts(artifacts, outputDir);

    await expect(result).rejects.toThrow(FileIOError);
    await expect(result).rejects.toThrow(
      `Failed to write declarations artifact: ${path.resolve(outputDir, 'types.h')}`,
    );
    expect(fs.writeFile).toHaveBeenCalledTimes(1);
  });
});

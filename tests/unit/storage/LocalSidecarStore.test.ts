import { LocalSidecarStore } from '../../../src/storage/LocalSidecarStore';
import { IOFailureError } from '../../../src/errors';
import { configureLogger } from '../../../src/utils/logger';
import fs from 'fs-extra';
import path from 'path';
import os from 'os';

const DIGEST = '492d5ea496056f1a6a6592241032fab764c321596317930b4fa0e1e8bc3b7470';

describe('LocalSidecarStore', () => {
  let tempDir: string;
  let dataFile: string;
  let store: LocalSidecarStore;

  beforeAll(() => {
    configureLogger({ quiet: true });
  });

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sidecar-store-'));
    dataFile = path.join(tempDir, 'sample.csv');
    await fs.writeFile(dataFile, 'a,b\n1,2\n');
    store = new LocalSidecarStore();
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  describe('sidecarPath', () => {
    it('should append the algorithm extension', () => {
      expect(store.sidecarPath(dataFile)).toBe(`${dataFile}.sha256`);
      expect(new LocalSidecarStore({ algorithm: 'sha512' }).sidecarPath(dataFile)).toBe(
        `${dataFile}.sha512`,
      );
    });
  });

  describe('read', () => {
    it('should report not_found when no sidecar exists', async () => {
      await expect(store.read(dataFile)).resolves.toEqual({ status: 'not_found' });
    });

    it('should report not_found when the parent directory does not exist', async () => {
      const result = await store.read(path.join(tempDir, 'nope', 'file.csv'));

      expect(result).toEqual({ status: 'not_found' });
    });

    it('should trim and lowercase the stored digest', async () => {
      await fs.writeFile(`${dataFile}.sha256`, `  ${DIGEST.toUpperCase()}\r\n`);

      await expect(store.read(dataFile)).resolves.toEqual({
        status: 'found',
        digest: DIGEST,
      });
    });

    it('should throw IOFailureError when the sidecar cannot be read', async () => {
      // A directory where the sidecar should be gives EISDIR
      await fs.ensureDir(`${dataFile}.sha256`);

      await expect(store.read(dataFile)).rejects.toBeInstanceOf(IOFailureError);
    });
  });

  describe('write', () => {
    it('should write a single newline-terminated digest line', async () => {
      await store.write(dataFile, DIGEST);

      const content = await fs.readFile(`${dataFile}.sha256`, 'utf8');
      expect(content).toBe(`${DIGEST}\n`);
    });

    it('should overwrite an existing sidecar and leave no temp files', async () => {
      await fs.writeFile(`${dataFile}.sha256`, 'stale\n');

      await store.write(dataFile, DIGEST);

      expect(await fs.readFile(`${dataFile}.sha256`, 'utf8')).toBe(`${DIGEST}\n`);
      expect((await fs.readdir(tempDir)).sort()).toEqual(['sample.csv', 'sample.csv.sha256']);
    });

    it('should round-trip through read', async () => {
      await store.write(dataFile, DIGEST);

      await expect(store.read(dataFile)).resolves.toEqual({
        status: 'found',
        digest: DIGEST,
      });
    });

    it('should throw IOFailureError and clean up when the rename fails', async () => {
      // Renaming a file over a non-empty directory fails
      await fs.ensureDir(path.join(`${dataFile}.sha256`, 'inner'));

      const promise = store.write(dataFile, DIGEST);

      await expect(promise).rejects.toBeInstanceOf(IOFailureError);
      await expect(promise).rejects.toMatchObject({ path: `${dataFile}.sha256` });
      expect((await fs.readdir(tempDir)).sort()).toEqual(['sample.csv', 'sample.csv.sha256']);
    });
  });
});

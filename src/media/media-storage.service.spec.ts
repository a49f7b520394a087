import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { mkdtemp, readFile, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import sharp from 'sharp';
import { MediaStorageService } from './media-storage.service';
import { InvalidImageException } from './invalid-image.exception';

const createImage = (format: 'png' | 'jpeg') =>
  sharp({
    create: {
      width: 4,
      height: 3,
      channels: 3,
      background: { r: 200, g: 30, b: 30 },
    },
  })
    .toFormat(format)
    .toBuffer();

describe('MediaStorageService', () => {
  let root: string;
  let service: MediaStorageService;

  beforeAll(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterAll(() => {
    jest.restoreAllMocks();
  });

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'media-storage-'));
    service = new MediaStorageService(
      new ConfigService({ media: { root, url: '/media/' } }),
    );
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('saveImage', () => {
    it('writes the bytes under a slugged unique name', async () => {
      const buffer = await createImage('png');

      const stored = await service.saveImage(
        buffer,
        'uploads/movies',
        'Sample movie',
      );

      expect(stored.path).toMatch(
        /^uploads\/movies\/sample-movie-[0-9a-f-]{36}\.png$/,
      );
      expect(stored).toMatchObject({ format: 'png', width: 4, height: 3 });
      const written = await readFile(path.join(root, stored.path));
      expect(written.equals(buffer)).toBe(true);
    });

    it('uses the jpg extension for jpeg input', async () => {
      const stored = await service.saveImage(
        await createImage('jpeg'),
        'uploads/movies',
        'Poster',
      );
      expect(stored.path.endsWith('.jpg')).toBe(true);
      expect(stored.format).toBe('jpeg');
    });

    it('gives two uploads of the same title different names', async () => {
      const buffer = await createImage('png');
      const first = await service.saveImage(buffer, 'uploads', 'Same');
      const second = await service.saveImage(buffer, 'uploads', 'Same');
      expect(first.path).not.toBe(second.path);
    });

    it('rejects bytes that are not an image and writes nothing', async () => {
      await expect(
        service.saveImage(
          Buffer.from('definitely not an image'),
          'uploads/movies',
          'Broken',
        ),
      ).rejects.toBeInstanceOf(InvalidImageException);
      await expect(stat(path.join(root, 'uploads'))).rejects.toMatchObject({
        code: 'ENOENT',
      });
    });

    it('rejects vector images', async () => {
      const svg = Buffer.from(
        '<svg xmlns="http://www.w3.org/2000/svg" width="4" height="4"></svg>',
      );
      await expect(
        service.saveImage(svg, 'uploads/movies', 'Vector'),
      ).rejects.toBeInstanceOf(InvalidImageException);
    });
  });

  describe('delete', () => {
    it('removes a stored file and reports a missing one', async () => {
      const stored = await service.saveImage(
        await createImage('png'),
        'uploads/movies',
        'Gone',
      );

      await expect(service.delete(stored.path)).resolves.toBe(true);
      await expect(service.delete(stored.path)).resolves.toBe(false);
    });

    it('rethrows errors other than a missing file', async () => {
      await service.saveImage(
        await createImage('png'),
        'uploads/movies',
        'Dir',
      );

      await expect(service.delete('uploads/movies')).rejects.toHaveProperty(
        'code',
      );
    });
  });

  describe('resolve', () => {
    it('keeps paths inside the media root', () => {
      expect(service.resolve('uploads/a.png')).toBe(
        path.join(root, 'uploads', 'a.png'),
      );
      expect(() => service.resolve('../outside.png')).toThrow(
        'Path ../outside.png escapes the media root',
      );
    });
  });

  describe('urlFor', () => {
    it('prefixes the public media url', () => {
      expect(service.urlFor('uploads/movies/a.png')).toBe(
        '/media/uploads/movies/a.png',
      );
    });

    it('returns null without a file', () => {
      expect(service.urlFor(null)).toBeNull();
      expect(service.urlFor('')).toBeNull();
    });

    it('adds the trailing slash to an absolute base url', () => {
      const cdn = new MediaStorageService(
        new ConfigService({
          media: { root, url: 'https://cdn.example.com/media' },
        }),
      );
      expect(cdn.urlFor('uploads/a.png')).toBe(
        'https://cdn.example.com/media/uploads/a.png',
      );
      expect(cdn.publicPrefix).toBe('https://cdn.example.com/media/');
    });
  });
});

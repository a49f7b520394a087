import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import {
  BadRequestException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { Types } from 'mongoose';
import { mkdtemp, readdir, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { Readable } from 'stream';
import sharp from 'sharp';
import { MoviesService, MOVIE_IMAGE_DIR } from './movies.service';
import { MediaStorageService } from '../../media/media-storage.service';
import { InvalidImageException } from '../../media/invalid-image.exception';
import {
  CatalogModels,
  createModels,
  modelProviders,
} from '../../../test/utils/models';

const pngImage = () =>
  sharp({
    create: {
      width: 2,
      height: 2,
      channels: 3,
      background: { r: 0, g: 0, b: 255 },
    },
  })
    .png()
    .toBuffer();

const asUpload = (
  buffer: Buffer,
  originalname = 'poster.png',
): Express.Multer.File => ({
  fieldname: 'image',
  originalname,
  encoding: '7bit',
  mimetype: 'image/png',
  size: buffer.length,
  buffer,
  destination: '',
  filename: '',
  path: '',
  stream: Readable.from([]),
});

describe('MoviesService', () => {
  let service: MoviesService;
  let models: CatalogModels;
  let mediaRoot: string;
  let logSpy: jest.SpyInstance;

  const seedCatalog = () => {
    const action = models.genres.insert({ name: 'Action' });
    const comedy = models.genres.insert({ name: 'Comedy' });
    const john = models.actors.insert({ firstName: 'John', lastName: 'Doe' });
    const jane = models.actors.insert({
      firstName: 'Jane',
      lastName: 'Smith',
    });
    const first = models.movies.insert({
      title: 'Movie 1',
      description: 'First',
      duration: 120,
      genres: [action._id],
      actors: [john._id],
    });
    const second = models.movies.insert({
      title: 'Movie 2',
      description: 'Second',
      duration: 95,
      genres: [comedy._id],
      actors: [jane._id],
    });
    return { action, comedy, john, jane, first, second };
  };

  const exists = (relativePath: string) =>
    stat(path.join(mediaRoot, relativePath)).then(
      () => true,
      () => false,
    );

  beforeEach(async () => {
    mediaRoot = await mkdtemp(path.join(tmpdir(), 'movies-service-'));
    models = createModels();
    logSpy = jest
      .spyOn(Logger.prototype, 'log')
      .mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

    const moduleRef = await Test.createTestingModule({
      providers: [
        MoviesService,
        MediaStorageService,
        ...modelProviders(models),
        {
          provide: ConfigService,
          useValue: new ConfigService({
            media: { root: mediaRoot, url: '/media/' },
          }),
        },
      ],
    }).compile();

    service = moduleRef.get(MoviesService);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(mediaRoot, { recursive: true, force: true });
  });

  describe('create', () => {
    it('stores the movie with its genre and actor ids', async () => {
      const { action, john } = seedCatalog();

      const created = await service.create({
        title: 'Movie 3',
        description: 'Third',
        duration: 100,
        genres: [action._id.toString()],
        actors: [john._id.toString()],
      });

      expect(created).toEqual({
        id: expect.any(String),
        title: 'Movie 3',
        description: 'Third',
        duration: 100,
        genres: [action._id.toString()],
        actors: [john._id.toString()],
      });
      expect(models.movies.get(created.id)).toMatchObject({ image: null });
    });

    it('rejects unknown genres', async () => {
      seedCatalog();
      await expect(
        service.create({
          title: 'Movie 3',
          description: 'Third',
          duration: 100,
          genres: [new Types.ObjectId().toString()],
          actors: [],
        }),
      ).rejects.toThrow(
        new BadRequestException('One or more genres do not exist'),
      );
      expect(models.movies.all()).toHaveLength(2);
    });

    it('rejects unknown actors', async () => {
      await expect(
        service.create({
          title: 'Movie 3',
          description: 'Third',
          duration: 100,
          genres: [],
          actors: [new Types.ObjectId().toString()],
        }),
      ).rejects.toThrow('One or more actors do not exist');
    });

    it('accepts the same id twice', async () => {
      const { action } = seedCatalog();
      const id = action._id.toString();

      const created = await service.create({
        title: 'Movie 3',
        description: 'Third',
        duration: 100,
        genres: [id, id],
        actors: [],
      });

      expect(created.genres).toEqual([id]);
    });

    it('ignores an inline image', async () => {
      const buffer = await pngImage();

      const created = await service.create(
        {
          title: 'Movie 3',
          description: 'Third',
          duration: 100,
          genres: [],
          actors: [],
        },
        asUpload(buffer),
      );

      expect(created).not.toHaveProperty('image');
      expect(models.movies.get(created.id)).toMatchObject({ image: null });
      expect(await exists(MOVIE_IMAGE_DIR)).toBe(false);
      expect(logSpy).toHaveBeenCalledWith(
        `Ignored inline image "poster.png" for new movie ${created.id}; use the upload-image endpoint`,
      );
    });
  });

  describe('findAll', () => {
    it('lists movies with genre names and actor full names', async () => {
      const { first, second } = seedCatalog();

      await expect(service.findAll()).resolves.toEqual([
        {
          id: first._id.toString(),
          title: 'Movie 1',
          description: 'First',
          duration: 120,
          genres: ['Action'],
          actors: ['John Doe'],
          image: null,
        },
        {
          id: second._id.toString(),
          title: 'Movie 2',
          description: 'Second',
          duration: 95,
          genres: ['Comedy'],
          actors: ['Jane Smith'],
          image: null,
        },
      ]);
    });

    it('filters by title substring regardless of case', async () => {
      seedCatalog();
      const movies = await service.findAll({ title: 'movie 2' });
      expect(movies.map((movie) => movie.title)).toEqual(['Movie 2']);
    });

    it('treats title as plain text', async () => {
      seedCatalog();
      await expect(service.findAll({ title: 'Movie .' })).resolves.toEqual(
        [],
      );
    });

    it('matches any of the given genres and actors', async () => {
      const { action, comedy, jane } = seedCatalog();

      const byGenres = await service.findAll({
        genres: [action._id.toString(), comedy._id.toString()],
      });
      expect(byGenres.map((movie) => movie.title)).toEqual([
        'Movie 1',
        'Movie 2',
      ]);

      const combined = await service.findAll({
        genres: [action._id.toString()],
        actors: [jane._id.toString()],
      });
      expect(combined).toEqual([]);
    });
  });

  describe('findOne', () => {
    it('returns nested genres and actors', async () => {
      const { first, action, john } = seedCatalog();

      await expect(service.findOne(first._id.toString())).resolves.toEqual({
        id: first._id.toString(),
        title: 'Movie 1',
        description: 'First',
        duration: 120,
        genres: [{ id: action._id.toString(), name: 'Action' }],
        actors: [
          {
            id: john._id.toString(),
            first_name: 'John',
            last_name: 'Doe',
            full_name: 'John Doe',
          },
        ],
        image: null,
      });
    });

    it('throws NotFound for a missing movie', async () => {
      await expect(
        service.findOne(new Types.ObjectId().toString()),
      ).rejects.toBeInstanceOf(NotFoundException);
    });
  });

  describe('uploadImage', () => {
    it('stores the file and returns its public url', async () => {
      const { first } = seedCatalog();
      const id = first._id.toString();

      const result = await service.uploadImage(
        id,
        asUpload(await pngImage()),
      );

      const stored = models.movies.get(id)?.image;
      expect(typeof stored).toBe('string');
      expect(result).toEqual({ id, image: `/media/${String(stored)}` });
      expect(String(stored)).toMatch(
        /^uploads\/movies\/movie-1-[0-9a-f-]{36}\.png$/,
      );
      expect(await exists(String(stored))).toBe(true);
    });

    it('deletes the previous file when replacing', async () => {
      const { first } = seedCatalog();
      const id = first._id.toString();
      const buffer = await pngImage();

      await service.uploadImage(id, asUpload(buffer));
      const previous = String(models.movies.get(id)?.image);
      await service.uploadImage(id, asUpload(buffer));
      const current = String(models.movies.get(id)?.image);

      expect(current).not.toBe(previous);
      expect(await exists(previous)).toBe(false);
      expect(await exists(current)).toBe(true);
    });

    it('keeps one file when two uploads overlap', async () => {
      const { first } = seedCatalog();
      const id = first._id.toString();
      const buffer = await pngImage();

      await Promise.all([
        service.uploadImage(id, asUpload(buffer)),
        service.uploadImage(id, asUpload(buffer)),
      ]);

      const current = String(models.movies.get(id)?.image);
      await expect(
        readdir(path.join(mediaRoot, MOVIE_IMAGE_DIR)),
      ).resolves.toEqual([path.basename(current)]);
    });

    it('requires a file', async () => {
      const { first } = seedCatalog();
      await expect(
        service.uploadImage(first._id.toString()),
      ).rejects.toThrow('No image file was submitted');
    });

    it('rejects non-image bytes and keeps the current image', async () => {
      const { first } = seedCatalog();
      const id = first._id.toString();
      await service.uploadImage(id, asUpload(await pngImage()));
      const current = String(models.movies.get(id)?.image);

      await expect(
        service.uploadImage(id, asUpload(Buffer.from('plain text'))),
      ).rejects.toBeInstanceOf(InvalidImageException);

      expect(models.movies.get(id)?.image).toBe(current);
      expect(await exists(current)).toBe(true);
    });

    it('throws NotFound before reading the file', async () => {
      await expect(
        service.uploadImage(new Types.ObjectId().toString()),
      ).rejects.toBeInstanceOf(NotFoundException);
    });
  });

  describe('removeImage', () => {
    it('clears the image and deletes the file', async () => {
      const { first } = seedCatalog();
      const id = first._id.toString();
      await service.uploadImage(id, asUpload(await pngImage()));
      const stored = String(models.movies.get(id)?.image);

      await expect(service.removeImage(id)).resolves.toEqual({
        id,
        image: null,
      });
      expect(models.movies.get(id)?.image).toBeNull();
      expect(await exists(stored)).toBe(false);
    });

    it('is a no-op without an image', async () => {
      const { second } = seedCatalog();
      const id = second._id.toString();
      await expect(service.removeImage(id)).resolves.toEqual({
        id,
        image: null,
      });
    });
  });
});

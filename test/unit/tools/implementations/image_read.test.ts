/**
 * imageRead 工具的單元測試
 */
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs/promises';
import path from 'path';
import {
  imageFormatFromExtension,
  imageReadTool,
  isSupportedImageType,
  MAX_IMAGE_SIZE_BYTES,
  preProcessImagePath,
  readImage,
} from '../../../../src/tools/implementations/image_read.js';
import { ToolExecutionError } from '../../../../src/tools/errors.js';
import { makeContext, makeTempDir, removeTempDir } from '../../helpers.js';

const PNG_HEADER = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

describe('imageFormatFromExtension', () => {
  it('識別支持的擴展名', () => {
    expect(imageFormatFromExtension('.png')).toBe('png');
    expect(imageFormatFromExtension('JPG')).toBe('jpeg');
    expect(imageFormatFromExtension('.jpeg')).toBe('jpeg');
    expect(imageFormatFromExtension('.WebP')).toBe('webp');
    expect(imageFormatFromExtension('.bmp')).toBeUndefined();
  });

  it('沒有擴展名的路徑不是圖片', () => {
    expect(isSupportedImageType('/tmp/picture')).toBe(false);
    expect(isSupportedImageType('/tmp/picture.gif')).toBe(true);
  });
});

describe('preProcessImagePath', () => {
  const screenshot = '/Users/tester/Desktop/Screenshot 2025-03-13 at 1.46.32 PM.png';

  it('macOS 截圖路徑中 AM/PM 前換成窄不換行空格', () => {
    expect(preProcessImagePath(screenshot, { fixesScreenshotPaths: true })).toBe(
      '/Users/tester/Desktop/Screenshot 2025-03-13 at 1.46.32\u202FPM.png'
    );
  });

  it('其他平台或普通路徑保持不變', () => {
    expect(preProcessImagePath(screenshot, { fixesScreenshotPaths: false })).toBe(screenshot);
    expect(preProcessImagePath('/tmp/a b.png', { fixesScreenshotPaths: true })).toBe('/tmp/a b.png');
  });
});

describe('readImage', () => {
  it('缺少擴展名或格式不支持時報錯', async () => {
    await expect(readImage('/tmp/no-extension')).rejects.toThrow('missing extension');
    await expect(readImage('/tmp/picture.BMP')).rejects.toThrow('unsupported format: bmp');
  });
});

describe('imageReadTool', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('讀取圖片字節', async () => {
    await fs.writeFile(path.join(dir, 'logo.png'), PNG_HEADER);
    await fs.writeFile(path.join(dir, 'photo.JPG'), Buffer.from([0xff, 0xd8, 0xff]));
    const ctx = makeContext(dir);
    const args = { paths: ['logo.png', 'photo.JPG'] };

    expect(await imageReadTool.validate(args, ctx)).toBeNull();
    const output = await imageReadTool.execute(args, ctx);

    expect(output.items).toEqual([
      { type: 'image', image: { format: 'png', source: { type: 'bytes', bytes: PNG_HEADER } } },
      { type: 'image', image: { format: 'jpeg', source: { type: 'bytes', bytes: Buffer.from([0xff, 0xd8, 0xff]) } } },
    ]);
  });

  it('收集所有路徑的校驗錯誤', async () => {
    await fs.writeFile(path.join(dir, 'notes.txt'), 'text');
    await fs.mkdir(path.join(dir, 'folder.png'));

    const error = await imageReadTool.validate({ paths: ['notes.txt', 'missing.png', 'folder.png'] }, makeContext(dir));
    const lines = (error ?? '').split('\n');

    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe(`'${path.join(dir, 'notes.txt')}' is not a supported image type`);
    expect(lines[1].startsWith(`failed to read file metadata for path ${path.join(dir, 'missing.png')}: `)).toBe(true);
    expect(lines[2]).toBe(`'${path.join(dir, 'folder.png')}' is not a file`);
  });

  it('失效的符號鏈接在校驗時被拒絕', async () => {
    const linkPath = path.join(dir, 'x.png');
    await fs.symlink(path.join(dir, 'gone.png'), linkPath);

    expect(await imageReadTool.validate({ paths: ['x.png'] }, makeContext(dir))).toBe(`'${linkPath}' is not a file`);
  });

  it('拒絕超過大小上限的圖片', async () => {
    const filePath = path.join(dir, 'huge.png');
    await fs.writeFile(filePath, '');
    await fs.truncate(filePath, MAX_IMAGE_SIZE_BYTES + 1);

    expect(await imageReadTool.validate({ paths: ['huge.png'] }, makeContext(dir))).toBe(
      `'${filePath}' has size ${MAX_IMAGE_SIZE_BYTES + 1} which is greater than the max supported size of ${MAX_IMAGE_SIZE_BYTES}`
    );
    await expect(readImage(filePath)).rejects.toThrow(
      `image at ${filePath} has size ${MAX_IMAGE_SIZE_BYTES + 1} bytes, but the max supported size is ${MAX_IMAGE_SIZE_BYTES}`
    );
  });

  it('大小恰好等於上限時可以通過', async () => {
    const filePath = path.join(dir, 'limit.png');
    await fs.writeFile(filePath, '');
    await fs.truncate(filePath, MAX_IMAGE_SIZE_BYTES);

    expect(await imageReadTool.validate({ paths: ['limit.png'] }, makeContext(dir))).toBeNull();
  });

  it('至少需要一個路徑', async () => {
    expect(await imageReadTool.validate({ paths: [] }, makeContext(dir))).toBe(
      'At least one image path must be provided'
    );
  });

  it('校驗後文件被刪除時整個調用失敗', async () => {
    await fs.writeFile(path.join(dir, 'a.png'), PNG_HEADER);
    await fs.writeFile(path.join(dir, 'b.png'), PNG_HEADER);
    const ctx = makeContext(dir);
    const args = { paths: ['a.png', 'b.png'] };

    expect(await imageReadTool.validate(args, ctx)).toBeNull();
    await fs.rm(path.join(dir, 'b.png'));

    const error = await imageReadTool.execute(args, ctx).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ToolExecutionError);
    if (error instanceof ToolExecutionError) {
      expect(error.kind).toBe('custom');
      expect(error.message.startsWith(`failed to read file metadata for ${path.join(dir, 'b.png')}: `)).toBe(true);
    }
  });
});

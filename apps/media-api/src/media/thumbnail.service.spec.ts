import { ConfigService } from '@nestjs/config';
import sharp from 'sharp';
import { AppConfig, loadConfig } from '@cloudmedia/common/config';
import { ThumbnailService } from './thumbnail.service';

describe('ThumbnailService', () => {
  const service = new ThumbnailService(new ConfigService<AppConfig, true>(loadConfig({})));

  it('should fit a large image inside 300x300 keeping its aspect ratio', async () => {
    const source = await sharp({
      create: { width: 640, height: 480, channels: 3, background: { r: 255, g: 0, b: 0 } },
    })
      .jpeg()
      .toBuffer();

    const thumbnail = await service.generate(source);

    const metadata = await sharp(thumbnail).metadata();
    expect(metadata.format).toBe('jpeg');
    expect(metadata.width).toBe(300);
    expect(metadata.height).toBe(225);
  });

  it('should not enlarge a small image', async () => {
    const source = await sharp({
      create: { width: 40, height: 20, channels: 3, background: { r: 0, g: 0, b: 255 } },
    })
      .png()
      .toBuffer();

    const metadata = await sharp(await service.generate(source)).metadata();

    expect(metadata.width).toBe(40);
    expect(metadata.height).toBe(20);
  });

  it('should flatten transparency onto white', async () => {
    const source = await sharp({
      create: { width: 10, height: 10, channels: 4, background: { r: 0, g: 0, b: 0, alpha: 0 } },
    })
      .png()
      .toBuffer();

    const { data } = await sharp(await service.generate(source)).raw().toBuffer({ resolveWithObject: true });

    expect(data[0]).toBeGreaterThan(250);
    expect(data[1]).toBeGreaterThan(250);
    expect(data[2]).toBeGreaterThan(250);
  });

  it('should reject content that is not an image', async () => {
    await expect(service.generate(Buffer.from('not an image'))).rejects.toThrow();
  });
});

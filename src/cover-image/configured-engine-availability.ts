import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ImageEngine,
  ImageEngineAvailability,
  isImageEngine,
} from './image-engine.interface';

const DEFAULT_IMAGE_ENGINES = 'dall-e-3';

/**
 * Engines listed in `IMAGE_ENGINES` (comma separated) are available.
 */
@Injectable()
export class ConfiguredEngineAvailability implements ImageEngineAvailability {
  private readonly logger = new Logger(ConfiguredEngineAvailability.name);
  private readonly engines: ReadonlySet<ImageEngine>;

  constructor(private readonly configService: ConfigService) {
    const names = this.configService
      .get<string>('IMAGE_ENGINES', DEFAULT_IMAGE_ENGINES)
      .split(',')
      .map((name) => name.trim().toLowerCase())
      .filter((name) => name.length > 0);

    const engines = new Set<ImageEngine>();
    for (const name of names) {
      if (isImageEngine(name)) {
        engines.add(name);
      } else {
        this.logger.warn(`Ignoring unknown image engine "${name}"`);
      }
    }
    this.engines = engines;
  }

  isAvailable(engine: ImageEngine): boolean {
    return this.engines.has(engine);
  }
}

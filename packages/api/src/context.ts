import type {
  ImageToLatexConverter,
  ImgTexConfig,
  Logger,
  ProviderAvailability,
} from '@imgtex/core';

/** Long-lived collaborators created at service start and shared by every request. */
export interface AppServices {
  config: ImgTexConfig;
  logger: Logger;
  converter: ImageToLatexConverter | null;
  providers: ProviderAvailability | null;
  /** Why the converter could not be built, when it is `null`. */
  initError?: string;
}

export type AppEnv = {
  Variables: {
    services: AppServices;
  };
};

import { Region } from './types';

export class TileDownloadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DescriptorFetchError extends TileDownloadError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class DescriptorFormatError extends TileDownloadError {}

export class TileFetchError extends TileDownloadError {
  constructor(
    message: string,
    public readonly region: Region,
    public readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class EncodeError extends TileDownloadError {}

export class InvalidOptionsError extends TileDownloadError {
  constructor(public readonly problems: string[]) {
    super(problems.join('; '));
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class MeteoError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MeteoError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class WeatherError extends MeteoError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, `WEATHER_${code}`, options);
    this.name = 'WeatherError';
  }
}

/** Connectivity failure, or a response outside the 2xx range. */
export class NetworkError extends WeatherError {
  public readonly status: number | undefined;

  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super(message, 'NETWORK', options);
    this.name = 'NetworkError';
    this.status = options?.status;
  }
}

export class DecodeError extends WeatherError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
    super(message, 'DECODE', options);
    this.name = 'DecodeError';
    this.issues = issues;
  }
}

export class InvalidInputError extends WeatherError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'INVALID_INPUT', options);
    this.name = 'InvalidInputError';
  }
}

export class ConfigError extends MeteoError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

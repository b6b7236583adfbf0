export interface ConversionLogger {
  debug(message: string): void;
  warn(message: string): void;
}

const PREFIX = "[mapping]";

export const consoleLogger: ConversionLogger = {
  debug: (message) => console.debug(`${PREFIX} ${message}`),
  warn: (message) => console.warn(`${PREFIX} ${message}`),
};

export const silentLogger: ConversionLogger = {
  debug: () => {},
  warn: () => {},
};

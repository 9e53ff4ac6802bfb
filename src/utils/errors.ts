/**
 * Base class for every error raised by the screening engine and its CLI
 */
export class ScreeningError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * Raised when the entry point is handed something other than text
 */
export class InvalidInputError extends ScreeningError {}

/**
 * Raised when registry data fails validation or a pattern does not compile
 */
export class RegistryError extends ScreeningError {}

export class ConfigError extends ScreeningError {}

export class RecordsFileError extends ScreeningError {}

export type PageStreamErrorCode = "INVALID_CONFIGURATION"

export class PageStreamError extends Error {
  readonly code: PageStreamErrorCode

  constructor(code: PageStreamErrorCode, message: string) {
    super(message)
    this.name = "PageStreamError"
    this.code = code
  }
}

export class InvalidConfigurationError extends PageStreamError {
  /** Name of the rejected setting, e.g. `pageSize` or `BULK_PAGE_SIZE`. */
  readonly setting: string

  constructor(setting: string, message: string) {
    super("INVALID_CONFIGURATION", `Invalid ${setting}: ${message}`)
    this.name = "InvalidConfigurationError"
    this.setting = setting
  }
}

export const isPageStreamError = (value: unknown): value is PageStreamError => value instanceof PageStreamError

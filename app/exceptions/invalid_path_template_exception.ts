import DomainException from '#exceptions/domain_exception'

export default class InvalidPathTemplateException extends DomainException {
  static status = 500
  static code = 'E_INVALID_PATH_TEMPLATE'

  constructor(readonly templateName: string) {
    super(`Path template "${templateName}" has no stages`)
  }
}

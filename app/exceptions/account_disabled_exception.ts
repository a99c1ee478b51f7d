import DomainException from '#exceptions/domain_exception'

export default class AccountDisabledException extends DomainException {
  static status = 403
  static code = 'E_ACCOUNT_DISABLED'
  static message = 'Account is disabled'
}

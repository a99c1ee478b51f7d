import DomainException from '#exceptions/domain_exception'

/**
 * Raised when a user reaches for a child profile (or anything under
 * it) they do not own
 */
export default class ProfileAccessDeniedException extends DomainException {
  static status = 403
  static code = 'E_PROFILE_ACCESS_DENIED'
  static message = 'Unauthorized'
}

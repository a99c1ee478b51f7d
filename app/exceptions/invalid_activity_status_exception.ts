import DomainException from '#exceptions/domain_exception'
import { ACTIVITY_STATUSES } from '#types/learning_paths'

export default class InvalidActivityStatusException extends DomainException {
  static status = 422
  static code = 'E_INVALID_ACTIVITY_STATUS'

  constructor(readonly requestedStatus: unknown) {
    super(
      `Invalid activity status "${String(requestedStatus)}". Expected one of: ${ACTIVITY_STATUSES.join(', ')}`
    )
  }
}

import DomainException from '#exceptions/domain_exception'

export default class RecordNotFoundException extends DomainException {
  static status = 404
  static code = 'E_RECORD_NOT_FOUND'

  constructor(
    readonly resource: string,
    readonly id: number
  ) {
    super(`Cannot find ${resource} with id ${id}`)
  }
}

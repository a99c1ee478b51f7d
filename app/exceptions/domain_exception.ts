import { Exception } from '@adonisjs/core/exceptions'
import type { HttpContext } from '@adonisjs/core/http'

/**
 * Base class of the errors raised by the application itself. They
 * render as `{ message, code }` with the status declared on the
 * subclass.
 */
export default abstract class DomainException extends Exception {
  async handle(error: this, ctx: HttpContext) {
    ctx.response.status(error.status).send({
      message: error.message,
      code: error.code,
    })
  }
}

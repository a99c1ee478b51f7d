import app from '@adonisjs/core/services/app'
import { HttpContext, ExceptionHandler } from '@adonisjs/core/http'

export default class HttpExceptionHandler extends ExceptionHandler {
  /**
   * Print stack traces and source frames outside production
   */
  protected debug = !app.inProduction

  async handle(error: unknown, ctx: HttpContext) {
    return super.handle(error, ctx)
  }

  /**
   * Errors are reported through the request logger, status codes
   * below 500 are skipped by the parent class
   */
  async report(error: unknown, ctx: HttpContext) {
    return super.report(error, ctx)
  }
}

import app from '@adonisjs/core/services/app'
import { errors as vineErrors } from '@vinejs/vine'
import { Exception } from '@adonisjs/core/exceptions'
import { ExceptionHandler, type HttpContext } from '@adonisjs/core/http'
import { ResponseHelper } from '#helpers/response_helper'
import { ErrorCodes, HttpStatus } from '#constants/response_constants'

export default class HttpExceptionHandler extends ExceptionHandler {
  /**
   * In debug mode, the exception handler will display verbose errors
   * with pretty printed stack traces.
   */
  protected debug = !app.inProduction

  /**
   * Convert exception to response
   */
  async handle(error: unknown, ctx: HttpContext) {
    const { request, response } = ctx

    if (error instanceof vineErrors.E_VALIDATION_ERROR) {
      return response
        .status(HttpStatus.UNPROCESSABLE_ENTITY)
        .send(ResponseHelper.error('Validation failed', ErrorCodes.VALIDATION_ERROR, error.messages))
    }

    if (error instanceof Exception) {
      if (error.status === HttpStatus.NOT_FOUND) {
        return response
          .status(HttpStatus.NOT_FOUND)
          .send(
            ResponseHelper.error(
              `Route not found: ${request.method()} ${request.url()}`,
              ErrorCodes.RESOURCE_NOT_FOUND
            )
          )
      }

      const exposeMessage = error.status < 500 || !app.inProduction
      return response
        .status(error.status)
        .send(
          ResponseHelper.error(
            exposeMessage ? error.message : 'Internal server error',
            error.code ?? ErrorCodes.INTERNAL_SERVER_ERROR
          )
        )
    }

    if (this.debug) {
      return super.handle(error, ctx)
    }

    return response
      .status(HttpStatus.INTERNAL_SERVER_ERROR)
      .send(ResponseHelper.error('Internal server error', ErrorCodes.INTERNAL_SERVER_ERROR))
  }

  /**
   * Report exception for logging
   */
  async report(error: unknown, ctx: HttpContext) {
    // Les erreurs client (4xx) ne sont pas journalisées
    if (error instanceof Exception && error.status >= 400 && error.status < 500) {
      return
    }

    return super.report(error, ctx)
  }
}

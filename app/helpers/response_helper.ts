import { ResponseStatus } from '#constants/response_constants'

export interface SuccessResponse<T> {
  status: 'success'
  message?: string
  data: T
  timestamp: string
}

export interface ErrorResponse {
  status: 'error'
  message: string
  code: string
  details?: unknown
  timestamp: string
}

export class ResponseHelper {
  /**
   * Réponse de succès standard
   */
  static success<T>(data: T, message?: string): SuccessResponse<T> {
    return {
      status: ResponseStatus.SUCCESS,
      message,
      data,
      timestamp: new Date().toISOString(),
    }
  }

  /**
   * Réponse d'erreur standard
   */
  static error(message: string, code: string, details?: unknown): ErrorResponse {
    const response: ErrorResponse = {
      status: ResponseStatus.ERROR,
      message,
      code,
      timestamp: new Date().toISOString(),
    }

    if (details !== undefined) {
      response.details = details
    }

    return response
  }
}

import { UpstreamTimeoutException, type UpstreamService } from '#exceptions/bot_exceptions'

/**
 * Borne une opération externe dans le temps. Le contrôleur passé à
 * `operation` est annulé au dépassement du délai ou quand `parentSignal`
 * est annulé.
 */
export async function withTimeout<T>(
  service: UpstreamService,
  timeoutMs: number,
  operation: (signal: AbortSignal) => Promise<T>,
  parentSignal?: AbortSignal
): Promise<T> {
  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined

  const onParentAbort = () => controller.abort(parentSignal?.reason)
  if (parentSignal?.aborted) {
    controller.abort(parentSignal.reason)
  } else {
    parentSignal?.addEventListener('abort', onParentAbort, { once: true })
  }

  const deadline = new Promise<never>((_, reject) => {
    if (controller.signal.aborted) {
      reject(controller.signal.reason ?? new Error('Operation aborted'))
      return
    }

    timer = setTimeout(() => {
      const error = new UpstreamTimeoutException(service, timeoutMs)
      controller.abort(error)
      reject(error)
    }, timeoutMs)

    controller.signal.addEventListener(
      'abort',
      () => reject(controller.signal.reason ?? new Error('Operation aborted')),
      { once: true }
    )
  })

  try {
    return await Promise.race([operation(controller.signal), deadline])
  } finally {
    clearTimeout(timer)
    parentSignal?.removeEventListener('abort', onParentAbort)
  }
}

/**
 * Raccourcit un identifiant utilisateur pour les logs
 */
export function shortId(id: string): string {
  return id.slice(0, 8)
}

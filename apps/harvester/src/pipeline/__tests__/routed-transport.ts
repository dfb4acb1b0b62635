import type { TransportFailureKind } from '../../scraper/errors.js'
import type { FetchCallOptions, RequestDescriptor, Transport, TransportResult } from '../../scraper/types.js'
import type { TransportFactory } from '../context.js'

export type TransportAnswer =
  | { body: string; delayMs?: number }
  | { fail: TransportFailureKind; statusCode?: number; delayMs?: number }

/** In-process transport answering from a route function */
export class RoutedTransport implements Transport {
  readonly calls: string[] = []

  constructor(
    readonly name: string,
    private readonly route: (request: RequestDescriptor) => TransportAnswer
  ) {}

  async send(request: RequestDescriptor, _options?: FetchCallOptions): Promise<TransportResult> {
    this.calls.push(request.url)
    const answer = this.route(request)
    await new Promise(resolve => setTimeout(resolve, answer.delayMs ?? 0))
    if ('fail' in answer) {
      return { status: 'failed', kind: answer.fail, statusCode: answer.statusCode, error: `${answer.fail} from test`, durationMs: 1 }
    }
    return { status: 'ok', response: { url: request.url, statusCode: 200, text: answer.body }, durationMs: 1 }
  }
}

/** Same route for both transports of every source */
export function routedTransports(route: (request: RequestDescriptor) => TransportAnswer): TransportFactory {
  return () => ({
    primary: new RoutedTransport('primary', route),
    fallback: new RoutedTransport('fallback', route),
  })
}

export const noSleep = async (_ms: number, _signal?: AbortSignal): Promise<void> => {}

/**
 * Resource checker: fetches a resource, analyzes it and issues the related
 * fetches its response calls for
 */

import { statusOf } from '@conformance/cache-analysis';
import type { AnalyzedResponse, NegotiationFacts } from '@conformance/cache-analysis';
import { MESSAGE, NoteList, headerSubject } from '@conformance/notes';
import { finishDiagnosis } from './aggregate.mjs';
import { analyzeCapture } from './analysis.mjs';
import type { ExchangeAnalysis } from './analysis.mjs';
import { mergeConfig } from './config.mjs';
import type { CheckerConfig, CheckerConfigInput } from './config.mjs';
import { publish } from './diagnostics.mjs';
import { TransportError, toTransportError } from './errors.mjs';
import { logger as defaultLogger, maskHeaders } from './logger.mjs';
import type { Logger } from './logger.mjs';
import { FETCH_NOTES } from './notes.mjs';
import { planProbes } from './probes.mjs';
import type { Probe } from './probes.mjs';
import type {
  CheckOptions,
  Diagnosis,
  DiagnosisState,
  ExchangeFetcher,
  ExchangeRequest,
  RawExchange,
  RelatedDiagnosis,
  RelationKind,
  RequestHeader,
} from './types.mjs';

/**
 * Response bytes read beyond the body capture cap, for the status line and headers
 */
const HEADER_ALLOWANCE = 64 * 1024;

export interface CheckerOptions {
  logger?: Logger;
  /** Clock in epoch milliseconds. Default: Date.now */
  now?: () => number;
}

export interface ResourceChecker {
  readonly config: Readonly<CheckerConfig>;
  /**
   * Check a resource. Resolves with a Diagnosis for any single-resource
   * failure; a transport error becomes a failed Diagnosis.
   */
  check(uri: string, options?: CheckOptions): Promise<Diagnosis>;
}

interface FetchTask {
  uri: string;
  method: string;
  headers: readonly RequestHeader[];
  relation?: RelationKind;
  log: Logger;
}

interface FetchOutcome {
  analysis: ExchangeAnalysis;
  error?: TransportError;
}

/**
 * Publishes each state a Diagnosis passes through
 */
class StateTracker {
  private current?: DiagnosisState;

  constructor(
    private readonly uri: string,
    private readonly relation?: RelationKind
  ) {}

  to(next: DiagnosisState): void {
    publish({
      name: 'diagnosis:state',
      timestamp: Date.now(),
      uri: this.uri,
      relation: this.relation,
      from: this.current,
      to: next,
    });
    this.current = next;
  }
}

function normalizeUri(uri: string): string {
  return URL.canParse(uri) ? new URL(uri).href : uri;
}

function redirectMethod(status: number, method: string): string {
  if (status === 307 || status === 308 || method === 'HEAD') {
    return method;
  }
  return 'GET';
}

/**
 * Default ResourceChecker implementation
 */
export class Checker implements ResourceChecker {
  readonly config: Readonly<CheckerConfig>;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly fetcher: ExchangeFetcher,
    config: CheckerConfigInput = {},
    options: CheckerOptions = {}
  ) {
    this.config = Object.freeze(mergeConfig(config));
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? Date.now;
  }

  async check(uri: string, options: CheckOptions = {}): Promise<Diagnosis> {
    const target = normalizeUri(uri);
    const headers = (options.headers ?? []).map(({ name, value }) => ({ name, value }));
    if (!headers.some((h) => h.name.toLowerCase() === 'user-agent')) {
      headers.unshift({ name: 'User-Agent', value: this.config.userAgent });
    }
    const log = this.logger.child({ uri: target });
    const task: FetchTask = { uri: target, method: (options.method ?? 'GET').toUpperCase(), headers, log };

    const diagnosis = await this.inspect(task, [target]);
    log.info(
      {
        state: diagnosis.state,
        notes: diagnosis.notes.length,
        related: diagnosis.related.length,
        elapsed: diagnosis.timing.elapsed,
      },
      'Check complete'
    );
    return diagnosis;
  }

  /**
   * Fetch, analyze and follow up on one resource in a redirect chain.
   * The chain holds every URI already fetched on the way here.
   */
  private async inspect(task: FetchTask, chain: readonly string[]): Promise<Diagnosis> {
    const startedAt = this.now();
    const state = new StateTracker(task.uri, task.relation);
    const { analysis, error } = await this.fetchAndAnalyze(task, state);

    const related: RelatedDiagnosis[] = [];
    let negotiation: NegotiationFacts | undefined;
    const { response } = analysis;

    if (response && this.config.followRelatedFetches) {
      const status = statusOf(response.message) ?? 0;
      if (status >= 300 && status < 400) {
        const redirect = await this.followRedirect(task, response, chain, analysis.notes, state);
        if (redirect) {
          related.push(redirect);
        }
      } else if (status >= 200 && status < 300 && response.message.complete) {
        const probed = await this.runProbes(task, response, analysis.notes, state);
        related.push(...probed.related);
        negotiation = probed.negotiation;
      }
    }

    state.to(error || !response ? 'failed' : 'done');
    return finishDiagnosis({
      uri: task.uri,
      analysis,
      related,
      timing: { startedAt, elapsed: this.now() - startedAt },
      error,
      negotiation,
    });
  }

  /**
   * Fetch and analyze without any follow-ups
   */
  private async inspectOnce(task: FetchTask): Promise<{ diagnosis: Diagnosis; analysis: ExchangeAnalysis }> {
    const startedAt = this.now();
    const state = new StateTracker(task.uri, task.relation);
    const { analysis, error } = await this.fetchAndAnalyze(task, state);
    state.to(error || !analysis.response ? 'failed' : 'done');
    const diagnosis = finishDiagnosis({
      uri: task.uri,
      analysis,
      related: [],
      timing: { startedAt, elapsed: this.now() - startedAt },
      error,
    });
    return { diagnosis, analysis };
  }

  private async fetchAndAnalyze(task: FetchTask, state: StateTracker): Promise<FetchOutcome> {
    const { uri, method, headers, relation, log } = task;
    state.to('fetching');
    const started = this.now();
    publish({ name: 'fetch:start', timestamp: started, uri, method, relation });
    log.debug({ method, relation, headers: maskHeaders(headers) }, 'Fetch start');

    let exchange: RawExchange;
    try {
      exchange = await this.fetchWithTimeout({
        uri,
        method,
        headers,
        maxResponseBytes: this.config.bodyCaptureCap + HEADER_ALLOWANCE,
      });
    } catch (caught) {
      const error = toTransportError(caught);
      const duration = this.now() - started;
      publish({ name: 'fetch:error', timestamp: this.now(), uri, method, relation, duration, error });
      log.warn({ method, relation, code: error.code, duration }, `Fetch failed: ${error.message}`);

      const notes = new NoteList();
      notes.emit(MESSAGE, FETCH_NOTES.TRANSPORT_FAILED, { code: error.code, message: error.message });
      return { analysis: { request: { method, headers }, headers: {}, notes }, error };
    }

    const duration = this.now() - started;
    const bytes = exchange.response.length;
    publish({ name: 'fetch:end', timestamp: this.now(), uri, method, relation, duration, bytes });
    log.debug({ method, relation, bytes, truncated: exchange.truncated, duration }, 'Fetch end');

    const analysis = analyzeCapture(
      exchange,
      { method, headers },
      {
        uri,
        bodyCaptureCap: this.config.bodyCaptureCap,
        receivedAt: this.now() / 1000,
        onParsed: () => state.to('parsed'),
      }
    );
    if (analysis.response) {
      state.to('analyzed');
    }
    return { analysis };
  }

  /**
   * Call the fetcher, failing with a timeout TransportError once fetchTimeout
   * has passed even if the fetcher ignores its abort signal
   */
  private async fetchWithTimeout(request: Omit<ExchangeRequest, 'signal'>): Promise<RawExchange> {
    const controller = new AbortController();
    const { fetchTimeout } = this.config;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new TransportError('timeout', `No response within ${fetchTimeout} ms`);
        controller.abort(error);
        reject(error);
      }, fetchTimeout);
    });

    try {
      return await Promise.race([this.fetcher({ ...request, signal: controller.signal }), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async followRedirect(
    task: FetchTask,
    response: AnalyzedResponse,
    chain: readonly string[],
    notes: NoteList,
    state: StateTracker
  ): Promise<RelatedDiagnosis | undefined> {
    const location = response.headers.value('location');
    if (location === undefined || !URL.canParse(location)) {
      return undefined;
    }
    const target = new URL(location).href;

    if (chain.includes(target)) {
      notes.emit(headerSubject('location'), FETCH_NOTES.REDIRECT_LOOP, { location: target });
      task.log.warn({ location: target }, 'Redirect loop');
      return undefined;
    }
    // the chain starts with the first URI, so it holds one more entry than redirects followed
    if (chain.length > this.config.maxRedirects) {
      notes.emit(headerSubject('location'), FETCH_NOTES.REDIRECT_LIMIT, {
        location: target,
        limit: this.config.maxRedirects,
      });
      task.log.warn({ location: target, limit: this.config.maxRedirects }, 'Redirect limit reached');
      return undefined;
    }

    state.to('following-redirect');
    const relation: RelationKind = 'redirect-target';
    const diagnosis = await this.inspect(
      {
        uri: target,
        method: redirectMethod(statusOf(response.message) ?? 0, task.method),
        headers: task.headers,
        relation,
        log: this.logger.child({ uri: target, relation }),
      },
      [...chain, target]
    );
    if (diagnosis.error) {
      notes.emit(MESSAGE, FETCH_NOTES.RELATED_FETCH_FAILED, { relation, ...diagnosis.error });
    }
    return { relation, diagnosis };
  }

  /**
   * Issue every follow-up the response calls for, concurrently, and evaluate
   * the results against the primary response in a fixed order
   */
  private async runProbes(
    task: FetchTask,
    primary: AnalyzedResponse,
    notes: NoteList,
    state: StateTracker
  ): Promise<{ related: RelatedDiagnosis[]; negotiation?: NegotiationFacts }> {
    const probes = planProbes(primary, task, this.config.rangeProbeBytes);
    for (const probe of probes) {
      state.to(probe.state);
    }

    const outcomes = await Promise.all(
      probes.map(async (probe: Probe) => ({
        probe,
        ...(await this.inspectOnce({
          uri: task.uri,
          method: task.method,
          headers: [...task.headers, ...probe.headers],
          relation: probe.relation,
          log: this.logger.child({ uri: task.uri, relation: probe.relation }),
        })),
      }))
    );

    const related: RelatedDiagnosis[] = [];
    let negotiation: NegotiationFacts | undefined;
    for (const { probe, diagnosis, analysis } of outcomes) {
      related.push({ relation: probe.relation, diagnosis });
      if (!analysis.response) {
        notes.emit(MESSAGE, FETCH_NOTES.RELATED_FETCH_FAILED, {
          relation: probe.relation,
          code: diagnosis.error?.code ?? 'protocol',
          message: diagnosis.error?.message ?? 'The response could not be parsed',
        });
        continue;
      }
      const evaluation = probe.evaluate(primary, analysis.response);
      notes.extend(evaluation.notes);
      negotiation = evaluation.negotiation ?? negotiation;
    }
    return { related, negotiation };
  }
}

/**
 * Create a resource checker
 *
 * @throws ConfigurationError when an option is invalid; nothing is fetched
 *
 * @example
 * const checker = createResourceChecker(createSocketFetcher(), { maxRedirects: 3 });
 * const diagnosis = await checker.check('https://example.com/');
 * diagnosis.notes.filter((n) => n.level === 'bad');
 */
export function createResourceChecker(
  fetcher: ExchangeFetcher,
  config: CheckerConfigInput = {},
  options: CheckerOptions = {}
): ResourceChecker {
  return new Checker(fetcher, config, options);
}

/**
 * Retrieval Orchestrator
 *
 * Drives the candidate list of a request through each provider until one
 * succeeds.
 *
 * CONTRACT:
 * - Input and configuration errors are raised before any network call.
 * - Candidates are tried strictly one after another; never two at once.
 * - A failed attempt is recorded ({ provider, kind, message }) and the next
 *   candidate is tried. The same provider is never retried.
 * - At most one provider succeeds. Its staging tree is renamed onto the
 *   canonical final path and the call returns.
 * - Every failed attempt removes its staging tree, so only a complete product
 *   is ever visible at the final path.
 * - Cancellation is checked before each attempt and aborts the running one.
 *
 * ATTEMPT TIMEOUT:
 * Each attempt runs under a signal combining the request's signal with its
 * own timer. An attempt still running when the timer fires is abandoned and
 * recorded as ProviderTimeout.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import {
  InvalidOutputTargetError,
  InvalidProductIDError,
  ObjectNotFoundError,
  ProviderTimeoutError,
  RetrievalCancelledError,
  RetrievalExhaustedError,
  errorMessage,
  isGatewayError,
  type AttemptFailure,
} from '../core/errors.js';
import { mergeAbortSignals } from '../core/http-client.js';
import {
  isDemDataKind,
  type DataRequest,
  type ImageryDataKind,
  type MaterializedProduct,
  type ProviderName,
} from '../core/types.js';
import { replaceTree } from '../core/utils/atomic-write.js';
import { sha256File, totalSize, walkFiles } from '../core/utils/files.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import type { GatewayConfig } from '../config/gateway-config.js';
import { detectDataKind, parseProductId } from '../products/product-id.js';
import { createProviders, type ProviderDependencies } from '../providers/provider-factory.js';
import { providerRegistry, type ProviderRegistry } from '../providers/registry.js';
import type { ProviderSet, RetrievalProvider } from '../providers/types.js';
import { selectCandidates } from '../selection/source-selector.js';
import { parseOpticalGridTile } from '../tiles/mgrs.js';
import { assertNonEmptyFootprint, demTileIdsFor } from '../tiles/tile-resolver.js';
import { canonicalName } from './naming.js';
import { prepareOutputDirectory } from './output-target.js';

/**
 * How long a failed attempt may take to wind down before its staging tree is
 * removed anyway
 */
const STAGING_GRACE_MS = 5_000;

export interface OrchestratorOptions {
  /** Defaults to providers built from the configuration */
  readonly providers?: ProviderSet;
  readonly registry?: ProviderRegistry;
  readonly providerDependencies?: ProviderDependencies;
  readonly logger?: Logger;
}

export interface RetrieveByIdOptions {
  readonly signal?: AbortSignal;
  readonly attemptTimeoutMs?: number;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Settle with the work, or reject with the signal's reason as soon as it aborts
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Input errors every provider would hit, raised before any network call
 */
function validateLocator(request: DataRequest): void {
  const { dataKind, locator } = request;

  switch (locator.type) {
    case 'tile':
      if (isDemDataKind(dataKind)) {
        demTileIdsFor(dataKind, locator.tileId);
      } else {
        parseOpticalGridTile(locator.tileId);
      }
      return;
    case 'footprint':
      assertNonEmptyFootprint(locator.footprint);
      return;
    case 'product': {
      if (isDemDataKind(dataKind)) {
        throw new InvalidProductIDError(locator.productId, `${dataKind} is retrieved by tile, not by product id`);
      }
      const detected = parseProductId(locator.productId).dataKind;
      if (detected !== dataKind) {
        throw new InvalidProductIDError(locator.productId, `names a ${detected} product, not ${dataKind}`);
      }
      return;
    }
  }
}

// ============================================================================
// Orchestrator
// ============================================================================

export class RetrievalOrchestrator {
  private readonly config: GatewayConfig;
  private readonly registry: ProviderRegistry;
  private readonly providers: ProviderSet;
  private readonly log: Logger;

  constructor(config: GatewayConfig, options: OrchestratorOptions = {}) {
    this.config = config;
    this.registry = options.registry ?? providerRegistry;
    this.log = options.logger ?? createLogger({ module: 'retrieval' });
    this.providers =
      options.providers ??
      createProviders(config, { registry: this.registry, logger: options.logger, ...options.providerDependencies });
  }

  /**
   * Retrieve one product by its identifier; the data kind follows from the id
   *
   * @param provider - explicit provider, no fallback when set
   * @throws {InvalidProductIDError} when the id matches no product grammar
   */
  async retrieveById(
    productId: string,
    provider: string | undefined,
    outputDirectory: string,
    options: RetrieveByIdOptions = {}
  ): Promise<MaterializedProduct> {
    const dataKind: ImageryDataKind = detectDataKind(productId);
    return this.retrieve({
      dataKind,
      locator: { type: 'product', productId },
      outputDirectory,
      provider: provider !== undefined ? this.registry.getProvider(provider).name : undefined,
      signal: options.signal,
      attemptTimeoutMs: options.attemptTimeoutMs,
    });
  }

  /**
   * Retrieve the product(s) a request designates from the first provider
   * that can serve them
   *
   * @throws {RetrievalExhaustedError} when every candidate failed
   * @throws {RetrievalCancelledError} when the request signal aborted
   */
  async retrieve(request: DataRequest): Promise<MaterializedProduct> {
    validateLocator(request);
    const candidates = selectCandidates(request, this.config, this.registry);
    const outputDirectory = await prepareOutputDirectory(request.outputDirectory);

    const name = canonicalName(request);
    const finalPath = join(outputDirectory, name);
    const subject = `${request.dataKind} ${name}`;
    const failures: AttemptFailure[] = [];

    this.log.info('Retrieval started', {
      subject,
      candidates: candidates.map((candidate) => candidate.name),
    });

    for (const [index, candidate] of candidates.entries()) {
      if (request.signal?.aborted) {
        throw new RetrievalCancelledError(subject, failures);
      }

      const provider = this.providers.get(candidate.name);
      if (!provider) {
        failures.push({ provider: candidate.name, kind: 'ProviderFailure', message: 'provider not configured' });
        continue;
      }

      this.log.info('Trying provider', { subject, provider: candidate.name, attempt: index + 1, of: candidates.length });

      const outcome = await this.attempt(provider, request, outputDirectory, finalPath);
      if (outcome.ok) {
        this.log.info('Retrieval succeeded', {
          subject,
          provider: candidate.name,
          localPath: outcome.product.localPath,
          byteSize: outcome.product.byteSize,
        });
        return outcome.product;
      }

      failures.push(outcome.failure);
      this.log.warn('Provider failed', {
        subject,
        provider: candidate.name,
        kind: outcome.failure.kind,
        message: outcome.failure.message,
      });

      if (request.signal?.aborted) {
        throw new RetrievalCancelledError(subject, failures);
      }
    }

    this.log.error('Retrieval exhausted', { subject, failures: failures.length });
    throw new RetrievalExhaustedError(subject, failures);
  }

  /**
   * One provider attempt in its own staging directory
   */
  private async attempt(
    provider: RetrievalProvider,
    request: DataRequest,
    outputDirectory: string,
    finalPath: string
  ): Promise<{ ok: true; product: MaterializedProduct } | { ok: false; failure: AttemptFailure }> {
    const providerName: ProviderName = provider.descriptor.name;
    const timeoutMs = request.attemptTimeoutMs ?? this.config.attemptTimeoutMs;
    const timeout = new AbortController();
    const timer = setTimeout(() => timeout.abort(new ProviderTimeoutError(providerName, timeoutMs)), timeoutMs);
    const signal = mergeAbortSignals([request.signal, timeout.signal]);

    let stagingDir: string;
    try {
      stagingDir = await mkdtemp(join(outputDirectory, `.staging-${providerName}-`));
    } catch (error) {
      clearTimeout(timer);
      throw new InvalidOutputTargetError(outputDirectory, `cannot create staging directory: ${errorMessage(error)}`);
    }

    const work = provider.fetch(request, {
      stagingDir,
      signal,
      logger: this.log.child({ provider: providerName }),
    });
    const settled = work.then(
      () => undefined,
      () => undefined
    );

    try {
      await untilAborted(work, signal);
      const product = await this.materialize(providerName, stagingDir, finalPath);
      return { ok: true, product };
    } catch (error) {
      await Promise.race([settled, delay(STAGING_GRACE_MS, undefined, { ref: false })]);
      await rm(stagingDir, { recursive: true, force: true });

      if (error instanceof InvalidOutputTargetError) throw error;
      if (request.signal?.aborted) {
        return { ok: false, failure: { provider: providerName, kind: 'RetrievalCancelled', message: 'cancelled' } };
      }
      if (timeout.signal.aborted) {
        const timedOut = new ProviderTimeoutError(providerName, timeoutMs);
        return { ok: false, failure: { provider: providerName, kind: timedOut.kind, message: timedOut.message } };
      }
      return {
        ok: false,
        failure: {
          provider: providerName,
          kind: isGatewayError(error) ? error.kind : 'ProviderFailure',
          message: errorMessage(error),
        },
      };
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Move a complete staging tree onto the final path and describe it
   */
  private async materialize(
    providerName: ProviderName,
    stagingDir: string,
    finalPath: string
  ): Promise<MaterializedProduct> {
    const files = await walkFiles(stagingDir);
    if (files.length === 0) {
      throw new ObjectNotFoundError(providerName, 'provider produced no files');
    }

    const byteSize = await totalSize(stagingDir, files);
    try {
      await replaceTree(stagingDir, finalPath);
    } catch (error) {
      throw new InvalidOutputTargetError(finalPath, `cannot move product into place: ${errorMessage(error)}`);
    }

    const checksum = files.length === 1 ? await sha256File(join(finalPath, ...files[0].split('/'))) : undefined;

    return {
      localPath: finalPath,
      sourceProvider: providerName,
      byteSize,
      retrievedAt: new Date(),
      files,
      checksum,
    };
  }
}

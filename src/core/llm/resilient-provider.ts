/**
 * Wraps an LLM provider with retry logic and circuit breaker integration.
 * Retryable failures back off 100/200/400 ms. A stream is only retried when
 * it failed before yielding anything, so no chunk is ever delivered twice.
 */
import type {
  LLMProvider,
  LLMChatParams,
  LLMResponse,
  LLMStreamEvent,
  ProviderCapabilities,
} from "./provider.js";
import type { CircuitBreaker } from "./circuit-breaker.js";
import { LLMError, toLLMError } from "./errors.js";
import type { Logger } from "../../utils/logger.js";
import type { EventBus } from "../events.js";
import { makeEvent } from "../events.js";

const RETRY_DELAYS = [100, 200, 400];

export class ResilientLLMProvider implements LLMProvider {
  readonly name: string;
  readonly capabilities: ProviderCapabilities;

  constructor(
    private inner: LLMProvider,
    private circuitBreaker: CircuitBreaker,
    private logger: Logger,
    private eventBus?: EventBus,
    private retryDelays: number[] = RETRY_DELAYS
  ) {
    this.name = inner.name;
    this.capabilities = inner.capabilities;
  }

  async chat(params: LLMChatParams): Promise<LLMResponse> {
    this.assertAvailable();

    let lastError: LLMError | undefined;
    for (let attempt = 0; attempt <= this.retryDelays.length; attempt++) {
      try {
        const response = await this.inner.chat(params);
        this.circuitBreaker.recordSuccess();
        return response;
      } catch (err) {
        lastError = toLLMError(err, this.name);
        // Cancelled by the caller, not a provider fault
        if (params.signal?.aborted) throw lastError;
        if (!(await this.shouldRetry(lastError, attempt, params.signal))) break;
      }
    }

    throw this.fail(lastError);
  }

  async *streamChat(params: LLMChatParams): AsyncGenerator<LLMStreamEvent> {
    this.assertAvailable();

    let lastError: LLMError | undefined;
    for (let attempt = 0; attempt <= this.retryDelays.length; attempt++) {
      let yielded = false;
      try {
        for await (const event of this.inner.streamChat(params)) {
          yielded = true;
          yield event;
        }
        this.circuitBreaker.recordSuccess();
        return;
      } catch (err) {
        lastError = toLLMError(err, this.name);
        if (params.signal?.aborted) throw lastError;
        if (yielded) break;
        if (!(await this.shouldRetry(lastError, attempt, params.signal))) break;
      }
    }

    throw this.fail(lastError);
  }

  private assertAvailable(): void {
    if (!this.circuitBreaker.canExecute()) {
      throw new LLMError(
        "unavailable",
        `Provider "${this.name}" circuit breaker is open`,
        { provider: this.name }
      );
    }
  }

  private async shouldRetry(
    error: LLMError,
    attempt: number,
    signal?: AbortSignal
  ): Promise<boolean> {
    const delay = this.retryDelays[attempt];
    if (delay === undefined || !error.retryable || signal?.aborted) return false;

    this.logger.debug(
      { provider: this.name, attempt: attempt + 1, delay, kind: error.kind },
      "Retrying LLM request"
    );
    await new Promise((resolve) => setTimeout(resolve, delay));
    return true;
  }

  private fail(error: LLMError | undefined): LLMError {
    const finalError =
      error ?? new LLMError("unknown", "LLM request failed", { provider: this.name });

    // Auth and protocol errors are caller problems, not provider health
    if (finalError.kind === "auth" || finalError.kind === "protocol") {
      return finalError;
    }

    const tripped = this.circuitBreaker.recordFailure();
    if (tripped && this.eventBus) {
      this.eventBus
        .publish(
          makeEvent(
            "alert.system.llm_failure",
            "llm",
            { provider: this.name, kind: finalError.kind, error: finalError.message },
            "high"
          )
        )
        .catch((e: unknown) => {
          this.logger.error({ error: e }, "Failed to publish LLM failure alert");
        });
    }
    return finalError;
  }
}

import type { ZodError } from 'zod';
import type { Logger } from '../logger/types.js';
import { LogComponent } from '../logger/types.js';
import type { StepwiseRuntimeError } from '../errors/runtime-error.js';
import { abortReason } from '../utils/abort.js';
import { errorMessage } from '../utils/error-conversion.js';
import { ToolError } from './errors.js';
import { formatToolOutput, INTERRUPTED_OUTPUT } from './output.js';
import type { ToolRegistry } from './registry.js';
import type { ValidatedToolDispatchConfig } from './schemas.js';
import type { Tool, ToolCall, ToolFailureKind, ToolResult } from './types.js';

export interface ToolDispatcherOptions {
    registry: ToolRegistry;
    config: ValidatedToolDispatchConfig;
    logger: Logger;
}

/**
 * A dispatched call with its final status, paired with its result
 */
export interface DispatchOutcome {
    call: ToolCall;
    result: ToolResult;
}

export interface DispatchOptions {
    /** Cancels calls not yet started and signals running ones */
    signal: AbortSignal;
    /** Invoked when a call's tool begins executing, with status `running` */
    onStart?: ((call: ToolCall, index: number) => void) | undefined;
    /** Invoked as each call settles, in completion order */
    onResult?: ((outcome: DispatchOutcome, index: number) => void) | undefined;
}

function formatIssues(error: ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

/**
 * Executes the tool calls of one turn with bounded concurrency.
 *
 * Failures stay scoped to their call: unknown tools, invalid arguments, thrown errors
 * and idle timeouts all become failed results, and siblings keep running. Outcomes are
 * returned in the order of `calls` regardless of completion order.
 */
export class ToolDispatcher {
    private readonly registry: ToolRegistry;
    private readonly config: ValidatedToolDispatchConfig;
    private readonly logger: Logger;

    constructor(options: ToolDispatcherOptions) {
        this.registry = options.registry;
        this.config = options.config;
        this.logger = options.logger.createChild(LogComponent.TOOLS);
    }

    async dispatch(calls: readonly ToolCall[], options: DispatchOptions): Promise<DispatchOutcome[]> {
        const { signal, onStart, onResult } = options;
        const outcomes = new Map<number, DispatchOutcome>();
        let next = 0;

        const worker = async (): Promise<void> => {
            while (next < calls.length) {
                const index = next++;
                const call = calls[index];
                if (!call) continue;

                const outcome = signal.aborted
                    ? this.cancelledOutcome(call)
                    : await this.execute(call, signal, (running) =>
                          this.notify(() => onStart?.(running, index), call.id)
                      );
                outcomes.set(index, outcome);
                this.notify(() => onResult?.(outcome, index), call.id);
            }
        };

        const workerCount = Math.min(this.config.maxConcurrency, calls.length);
        this.logger.debug(`Dispatching ${calls.length} tool call(s) on ${workerCount} worker(s)`);
        await Promise.all(Array.from({ length: workerCount }, () => worker()));

        return calls.map((call, index) => outcomes.get(index) ?? this.cancelledOutcome(call));
    }

    private notify(callback: () => void, toolCallId: string): void {
        try {
            callback();
        } catch (error) {
            this.logger.error(`Tool dispatch callback failed: ${errorMessage(error)}`, {
                toolCallId,
            });
        }
    }

    private async execute(
        call: ToolCall,
        parentSignal: AbortSignal,
        onStart: (call: ToolCall) => void
    ): Promise<DispatchOutcome> {
        const tool = this.registry.resolve(call.name);
        if (!tool) {
            this.logger.warn(`Model requested unknown tool '${call.name}'`);
            return this.failure(call, 'unknown-tool', ToolError.notFound(call.name), (error) => error.message);
        }

        if (call.argumentsError !== undefined) {
            return this.failure(
                call,
                'execution-error',
                ToolError.invalidArgs(call.name, call.argumentsError)
            );
        }

        const parsed = tool.inputSchema.safeParse(call.arguments);
        if (!parsed.success) {
            return this.failure(
                call,
                'execution-error',
                ToolError.invalidArgs(call.name, formatIssues(parsed.error))
            );
        }

        onStart({ ...call, status: 'running' });
        return this.run(tool, call, parsed.data, parentSignal);
    }

    private run(
        tool: Tool,
        call: ToolCall,
        input: unknown,
        parentSignal: AbortSignal
    ): Promise<DispatchOutcome> {
        const { idleTimeoutMs, cancelGraceMs } = this.config;
        const controller = new AbortController();

        return new Promise<DispatchOutcome>((resolve) => {
            let settled = false;
            let idleTimer: ReturnType<typeof setTimeout> | undefined;
            let graceTimer: ReturnType<typeof setTimeout> | undefined;

            const settle = (outcome: DispatchOutcome) => {
                if (settled) return;
                settled = true;
                clearTimeout(idleTimer);
                clearTimeout(graceTimer);
                parentSignal.removeEventListener('abort', onParentAbort);
                resolve(outcome);
            };

            const armIdleTimer = () => {
                if (idleTimeoutMs <= 0) return;
                clearTimeout(idleTimer);
                idleTimer = setTimeout(() => {
                    const error = ToolError.executionTimeout(call.name, idleTimeoutMs);
                    this.logger.warn(error.message, { toolCallId: call.id });
                    controller.abort(error);
                    settle(this.failure(call, 'timeout', error, (e) => e.message));
                }, idleTimeoutMs);
            };

            const onParentAbort = () => {
                clearTimeout(idleTimer);
                controller.abort(abortReason(parentSignal));
                graceTimer = setTimeout(() => {
                    const error = ToolError.executionTimeout(call.name, cancelGraceMs);
                    this.logger.warn(
                        `Tool '${call.name}' did not stop within ${cancelGraceMs}ms of cancellation`,
                        { toolCallId: call.id }
                    );
                    settle(this.failure(call, 'timeout', error, (e) => e.message));
                }, cancelGraceMs);
            };

            parentSignal.addEventListener('abort', onParentAbort, { once: true });
            armIdleTimer();

            const context = {
                toolCallId: call.id,
                abortSignal: controller.signal,
                reportProgress: () => {
                    if (!settled && !controller.signal.aborted) armIdleTimer();
                },
                logger: this.logger,
            };

            this.logger.debug(`Executing tool '${tool.id}'`, { toolCallId: call.id });
            Promise.resolve()
                .then(() => tool.execute(input, context))
                .then(
                    (value) => {
                        if (parentSignal.aborted) {
                            settle(this.cancelledOutcome(call));
                            return;
                        }
                        settle({
                            call: { ...call, status: 'succeeded' },
                            result: {
                                toolCallId: call.id,
                                toolName: call.name,
                                success: true,
                                output: formatToolOutput(value),
                                data: value,
                            },
                        });
                    },
                    (error: unknown) => {
                        if (parentSignal.aborted) {
                            settle(this.cancelledOutcome(call));
                            return;
                        }
                        this.logger.error(`Tool '${call.name}' failed: ${errorMessage(error)}`, {
                            toolCallId: call.id,
                        });
                        settle(
                            this.failure(
                                call,
                                'execution-error',
                                ToolError.executionFailed(call.name, errorMessage(error)),
                                () => `Error executing tool: ${errorMessage(error)}`
                            )
                        );
                    }
                );
        });
    }

    private failure(
        call: ToolCall,
        kind: ToolFailureKind,
        error: StepwiseRuntimeError,
        describe: (error: StepwiseRuntimeError) => string = (e) => `Error executing tool: ${e.message}`
    ): DispatchOutcome {
        return {
            call: { ...call, status: 'failed' },
            result: {
                toolCallId: call.id,
                toolName: call.name,
                success: false,
                output: describe(error),
                error: { kind, code: error.code, message: error.message },
            },
        };
    }

    private cancelledOutcome(call: ToolCall): DispatchOutcome {
        const error = ToolError.cancelled(call.name);
        return {
            call: { ...call, status: 'cancelled' },
            result: {
                toolCallId: call.id,
                toolName: call.name,
                success: false,
                output: INTERRUPTED_OUTPUT,
                error: { kind: 'cancelled', code: error.code, message: error.message },
            },
        };
    }
}

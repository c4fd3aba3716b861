/**
 * Ordered extension hooks run between assembly and generation.
 */
import { HookError, ErrorCodes, RoutemarkError } from '../../utils/errors.js';
import type { RouteMetadata } from '../assembly/types.js';
import type { GenerationContext } from '../generation/types.js';

/** Receives every assembled route before they are frozen. */
export type PostParseHook = (routes: RouteMetadata[]) => void;

/** Receives the generation context before rendering. */
export type PreGenerationHook = (context: GenerationContext) => void;

type HookStage = 'post-parse' | 'pre-generation';

interface Registered<T> {
  name: string;
  hook: T;
}

export class HookPipeline {
  private postParse: Registered<PostParseHook>[] = [];
  private preGeneration: Registered<PreGenerationHook>[] = [];

  addPostParseHook(name: string, hook: PostParseHook): this {
    this.postParse.push({ name, hook });
    return this;
  }

  addPreGenerationHook(name: string, hook: PreGenerationHook): this {
    this.preGeneration.push({ name, hook });
    return this;
  }

  /**
   * Hook names per stage, in run order.
   */
  list(): Record<HookStage, string[]> {
    return {
      'post-parse': this.postParse.map((h) => h.name),
      'pre-generation': this.preGeneration.map((h) => h.name),
    };
  }

  runPostParse(routes: RouteMetadata[]): void {
    for (const { name, hook } of this.postParse) {
      invoke(name, 'post-parse', () => hook(routes));
    }
  }

  runPreGeneration(context: GenerationContext): void {
    for (const { name, hook } of this.preGeneration) {
      invoke(name, 'pre-generation', () => hook(context));
    }
  }
}

function invoke(name: string, stage: HookStage, run: () => void): void {
  try {
    run();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new HookError(
      ErrorCodes.HOOK_FAILED,
      `Hook '${name}' failed during ${stage}: ${message}`,
      {
        hook: name,
        stage,
        cause: error instanceof RoutemarkError ? error.code : undefined,
      }
    );
  }
}

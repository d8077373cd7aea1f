// =============================================================================
// AI SDK binding — Operation implementation backed by a language model
// =============================================================================

import { streamText } from "ai";
import type { LanguageModel } from "ai";

import type { TypeRef } from "../../domain/type-ref.js";
import type { ImplementationBinding, InvocationContext } from "../../operations/types.js";

export interface ModelBindingConfig {
  model: LanguageModel;
  /** Declared result type, e.g. `t.ref("User")` or `"User[]"` */
  returns: TypeRef | string;
  /** Builds the user prompt; the output format is appended after it */
  prompt: (args: readonly unknown[], context: InvocationContext) => string;
  system?: string;
  temperature?: number;
  maxOutputTokens?: number;
}

/**
 * Bind an operation version to a model through the AI SDK. The model's text
 * stream becomes the raw payload the decoder consumes.
 *
 * @example
 * ```ts
 * operations.register("ExtractUser", "gpt", createModelBinding({
 *   model: openai("gpt-4o-mini"),
 *   returns: "User",
 *   prompt: ([text]) => `Extract the user from:\n${String(text)}`,
 * }));
 * ```
 */
export function createModelBinding(config: ModelBindingConfig): ImplementationBinding {
  return {
    returns: config.returns,
    invoke(args, context) {
      const result = streamText({
        model: config.model,
        system: config.system,
        prompt: `${config.prompt(args, context)}\n\n${context.outputFormat}`,
        temperature: config.temperature,
        maxOutputTokens: config.maxOutputTokens,
        abortSignal: context.signal,
      });
      return result.textStream;
    },
  };
}

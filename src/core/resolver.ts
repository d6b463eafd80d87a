import type {
  Binding,
  DotenvValues,
  Environment,
  ResolutionContext,
  ResolveOptions,
  Segment,
} from "./types.ts";
import { interpolate } from "./interpolate.ts";

export class Resolver {
  private env: Environment;
  private override: boolean;
  private interpolate: boolean;
  private singleQuotesExpand: boolean;

  constructor(options: ResolveOptions = {}) {
    // Snapshot once so every reference in this pass sees the same environment
    this.env = Object.freeze({ ...(options.env ?? process.env) });
    this.override = options.override ?? true;
    this.interpolate = options.interpolate ?? true;
    this.singleQuotesExpand = options.singleQuotesExpand ?? false;
  }

  resolve(bindings: readonly Binding[]): DotenvValues {
    const context: ResolutionContext = new Map();

    for (const binding of bindings) {
      const value = this.interpolate && binding.value !== null
        ? this.expandSegments(binding.segments, context)
        : binding.value;

      // Map keeps the first insertion position when a key is set again
      context.set(binding.key, value);
    }

    return context;
  }

  // Adjacent expandable segments are joined first so a reference may span quotes
  private expandSegments(segments: readonly Segment[], context: ResolutionContext): string {
    let result = "";
    let run = "";
    for (const segment of segments) {
      if (segment.quote === "single" && !this.singleQuotesExpand) {
        result += this.expand(run, context) + segment.text;
        run = "";
      } else {
        run += segment.text;
      }
    }
    return result + this.expand(run, context);
  }

  private expand(text: string, context: ResolutionContext): string {
    return text === "" ? "" : interpolate(text, context, this.env, this.override);
  }
}

export function resolve(bindings: readonly Binding[], options: ResolveOptions = {}): DotenvValues {
  return new Resolver(options).resolve(bindings);
}

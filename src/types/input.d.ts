/**
 * Minimal typings for the `input` prompt package, which ships none
 */

declare module 'input' {
  export function text(message: string, options?: { default?: string }): Promise<string>;
  export function password(message: string, options?: { default?: string }): Promise<string>;
}

/**
 * Exhaustive switch utility for discriminated unions
 *
 * Use in the default branch of a switch so that adding a member to a union
 * (a new run intent, a new reporter event) fails to compile until every
 * switch handles it.
 *
 * @example
 * ```typescript
 * function verb(intent: ModeIntent): string {
 *   switch (intent) {
 *     case 'determine':
 *       return 'Determining';
 *     case 'verify':
 *       return 'Verifying';
 *     case 'list':
 *       return 'Listing';
 *     default:
 *       return assertNever(intent);
 *   }
 * }
 * ```
 *
 * @throws Error if called at runtime (indicates missing switch case)
 */
export function assertNever(x: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${JSON.stringify(x)}`);
}

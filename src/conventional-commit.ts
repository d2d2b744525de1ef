import type { DiagnosticSink, Message, ParseResult } from '@/types';

/**
 * Accumulates the fields recognized by the machine while it scans a message.
 *
 * Fields are set in grammar order (type, breaking marker, scope, description, body) and each at
 * most once per parse. A scope or body that was never seen stays `null`, which is how `export()`
 * tells an absent scope apart from an explicit empty `()`.
 */
export class ConventionalCommit {
  private _type = '';
  private _scope: string | null = null;
  private _breaking = false;
  private _description = '';
  private _body: string | null = null;

  constructor(private readonly sink?: DiagnosticSink) {}

  public setType(type: string): void {
    this._type = type;
    this.sink?.info('valid commit message type', { type });
  }

  public setScope(scope: string): void {
    this._scope = scope;
    this.sink?.info('valid commit message scope', { scope });
  }

  public setBreaking(): void {
    this._breaking = true;
    this.sink?.info('commit message communicates a breaking change');
  }

  public setDescription(description: string): void {
    this._description = description;
    this.sink?.info('valid commit message description', { description });
  }

  public setBody(body: string): void {
    this._body = body;
    this.sink?.info('valid commit message body', { body });
  }

  /**
   * Whether enough was recognized for a best-effort result: a type and a description.
   */
  public isMinimal(): boolean {
    return this._type !== '' && this._description !== '';
  }

  /**
   * Produces the public message view.
   */
  public export(): Message {
    return {
      type: this._type,
      scope: this._scope,
      breaking: this._breaking,
      description: this._description,
      body: this._body,
    };
  }
}

/**
 * Whether the message carries the `!` breaking change marker.
 */
export function isBreakingChange(message: Message): boolean {
  return message.breaking;
}

export function isFeat(message: Message): boolean {
  return message.type === 'feat';
}

export function isFix(message: Message): boolean {
  return message.type === 'fix';
}

/**
 * Whether a parse fully succeeded: a message and no diagnostic.
 *
 * A best-effort result carries both, and is therefore not valid.
 */
export function isValidMessage(result: ParseResult): result is { message: Message; diagnostic: null } {
  return result.message !== null && result.diagnostic === null;
}

/**
 * Rebuilds the textual commit message from its structured view.
 *
 * The output parses back to the same message with any profile that knows its type.
 *
 * @param message - The message to format
 * @returns The commit message text
 *
 * @example
 * ```typescript
 * formatMessage({ type: 'feat', scope: 'api', breaking: true, description: 'drop v1', body: null })
 * // → 'feat(api)!: drop v1'
 *
 * formatMessage({ type: 'fix', scope: null, breaking: false, description: 'typo', body: 'Details.' })
 * // → 'fix: typo\n\nDetails.'
 * ```
 */
export function formatMessage(message: Message): string {
  const scope = message.scope === null ? '' : `(${message.scope})`;
  const header = `${message.type}${scope}${message.breaking ? '!' : ''}: ${message.description}`;

  return message.body === null ? header : `${header}\n\n${message.body}`;
}

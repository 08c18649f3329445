import { text, password, isCancel, cancel } from '@clack/prompts'
import { ValidationError } from './errors'

export interface PromptOptions {
  readonly message: string
  readonly defaultValue?: string
  /** Mask the input (tokens) */
  readonly secret?: boolean
}

/** Source of operator answers. Empty answers resolve to the default. */
export interface Prompter {
  ask(opts: PromptOptions): Promise<string>
}

function label(opts: PromptOptions): string {
  if (!opts.defaultValue) return opts.message
  // never echo a secret default
  return `${opts.message} [${opts.secret === true ? 'configured' : opts.defaultValue}]`
}

export class ClackPrompter implements Prompter {
  public async ask(opts: PromptOptions): Promise<string> {
    const answer: string | symbol = opts.secret === true
      ? await password({ message: label(opts), mask: '*' })
      : await text({ message: label(opts), defaultValue: opts.defaultValue ?? '' })
    if (isCancel(answer)) {
      cancel('Cancelled')
      throw new ValidationError('Input cancelled by operator')
    }
    const trimmed: string = answer.trim()
    return trimmed.length > 0 ? trimmed : (opts.defaultValue ?? '')
  }
}

/** Answers from a fixed queue; used by --ci runs and tests. */
export class ScriptedPrompter implements Prompter {
  private readonly answers: string[]
  public readonly asked: string[] = []

  public constructor(answers: readonly string[]) {
    this.answers = [...answers]
  }

  public async ask(opts: PromptOptions): Promise<string> {
    this.asked.push(opts.message)
    const next: string = (this.answers.shift() ?? '').trim()
    return next.length > 0 ? next : (opts.defaultValue ?? '')
  }
}

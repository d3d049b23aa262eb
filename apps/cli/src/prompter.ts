/**
 * Modelsync CLI - Interactive Prompter
 */

import inquirer from 'inquirer';
import type { Prompter, TimeoutContext, TimeoutDecision } from '@modelsync/qc';

export interface PrompterHooks {
  /** Called around each prompt so spinners do not draw over it */
  pause?: () => void;
  resume?: () => void;
}

export class InquirerPrompter implements Prompter {
  constructor(private hooks: PrompterHooks = {}) {}

  async onTimeout(context: TimeoutContext): Promise<TimeoutDecision> {
    const seconds = Math.round(context.timeoutMs / 1000);
    this.hooks.pause?.();
    try {
      const { decision } = await inquirer.prompt<{ decision: TimeoutDecision }>([
        {
          type: 'list',
          name: 'decision',
          message: `${context.model} keeps timing out on ${context.questionId} after ${seconds}s`,
          choices: [
            { name: `Retry with a ${seconds * 2}s timeout`, value: 'extend' },
            { name: 'Cancel the run', value: 'cancel' },
          ],
        },
      ]);
      return decision;
    } finally {
      this.hooks.resume?.();
    }
  }
}

/**
 * Answers every timeout the same way, for unattended runs
 */
export class FixedPrompter implements Prompter {
  constructor(private decision: TimeoutDecision) {}

  async onTimeout(): Promise<TimeoutDecision> {
    return this.decision;
  }
}

export async function confirmCancel(hooks: PrompterHooks = {}): Promise<boolean> {
  hooks.pause?.();
  try {
    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
      {
        type: 'confirm',
        name: 'confirm',
        message: 'Cancel the run? Finished quantizations are kept',
        default: false,
      },
    ]);
    return confirm;
  } finally {
    hooks.resume?.();
  }
}

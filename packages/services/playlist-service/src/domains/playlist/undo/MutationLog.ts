/**
 * MutationLog
 *
 * Bounded undo/redo stacks of reversible playlist mutations. Executing a new
 * command discards the redo stack; past capacity the oldest command is
 * dropped.
 */

import { getLogger } from '../../../config/service-config';
import type { MutationCommand } from './commands';

const logger = getLogger('playlist-service-mutation-log');

export class MutationLog {
  private undoStack: MutationCommand[] = [];
  private redoStack: MutationCommand[] = [];

  constructor(private readonly capacity: number) {}

  execute<T extends MutationCommand>(command: T): T {
    command.redo();
    this.undoStack.push(command);
    this.redoStack = [];
    if (this.undoStack.length > this.capacity) {
      this.undoStack.shift();
    }
    logger.debug('Mutation executed', { description: command.description, depth: this.undoStack.length });
    return command;
  }

  /** Returns the undone command, or null when there is nothing to undo */
  undo(): MutationCommand | null {
    const command = this.undoStack.pop();
    if (!command) return null;
    command.undo();
    this.redoStack.push(command);
    logger.debug('Mutation undone', { description: command.description });
    return command;
  }

  redo(): MutationCommand | null {
    const command = this.redoStack.pop();
    if (!command) return null;
    command.redo();
    this.undoStack.push(command);
    logger.debug('Mutation redone', { description: command.description });
    return command;
  }

  get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  get undoText(): string | null {
    return this.undoStack.at(-1)?.description ?? null;
  }

  get redoText(): string | null {
    return this.redoStack.at(-1)?.description ?? null;
  }

  get depth(): number {
    return this.undoStack.length;
  }

  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
  }
}

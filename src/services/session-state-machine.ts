import {AccessSession, AccessSessionStatus} from '../models';
import {AccessErrors} from './access-errors';

/**
 * Operations that move a session out of its current status.
 */
export enum SessionOperation {
  EXIT = 'EXIT',
  FORCE_EXIT = 'FORCE_EXIT',
  EXPIRE = 'EXPIRE',
  BLOCK = 'BLOCK',
}

function unreachable(value: never): never {
  throw new Error('Unexpected value: ' + String(value));
}

/**
 * Transitions of the access session lifecycle.
 *
 * ```
 * ACTIVE  --EXIT/FORCE_EXIT--> COMPLETED
 * ACTIVE  --EXPIRE-----------> EXPIRED
 * ACTIVE  --BLOCK------------> BLOCKED
 * EXPIRED --FORCE_EXIT-------> COMPLETED
 * ```
 *
 * COMPLETED and BLOCKED are terminal.
 */
export abstract class SessionStateMachine {
  public static next(
    current: AccessSessionStatus,
    operation: SessionOperation,
  ): AccessSessionStatus {
    const target = SessionStateMachine.transition(current, operation);
    if (target === null) {
      throw AccessErrors.invalidState(
        `Operation ${operation} is not allowed on a session in status ${current}`,
      );
    }
    return target;
  }

  public static canApply(
    current: AccessSessionStatus,
    operation: SessionOperation,
  ): boolean {
    return SessionStateMachine.transition(current, operation) !== null;
  }

  public static isOpen(status: AccessSessionStatus): boolean {
    switch (status) {
      case AccessSessionStatus.ACTIVE:
      case AccessSessionStatus.EXPIRED:
        return true;
      case AccessSessionStatus.COMPLETED:
      case AccessSessionStatus.BLOCKED:
        return false;
      default:
        return unreachable(status);
    }
  }

  /**
   * An open session is overdue once its expected exit is strictly before `at`.
   */
  public static isOverdue(session: AccessSession, at: Date): boolean {
    return (
      SessionStateMachine.isOpen(session.status) &&
      session.expectedExitAt.getTime() < at.getTime()
    );
  }

  private static transition(
    current: AccessSessionStatus,
    operation: SessionOperation,
  ): AccessSessionStatus | null {
    switch (current) {
      case AccessSessionStatus.ACTIVE:
        switch (operation) {
          case SessionOperation.EXIT:
          case SessionOperation.FORCE_EXIT:
            return AccessSessionStatus.COMPLETED;
          case SessionOperation.EXPIRE:
            return AccessSessionStatus.EXPIRED;
          case SessionOperation.BLOCK:
            return AccessSessionStatus.BLOCKED;
          default:
            return unreachable(operation);
        }
      case AccessSessionStatus.EXPIRED:
        return operation === SessionOperation.FORCE_EXIT
          ? AccessSessionStatus.COMPLETED
          : null;
      case AccessSessionStatus.COMPLETED:
      case AccessSessionStatus.BLOCKED:
        return null;
      default:
        return unreachable(current);
    }
  }
}

import type {
  StateDefinition,
  StateMachineDefinition,
} from '../interfaces/state-machine-definition.interface';

function assertTargetExists(
  id: string,
  states: object,
  target: string,
  stateName: string,
): void {
  if (!(target in states)) {
    throw new Error(
      `State machine definition ${id}: state "${stateName}" allows unknown state "${target}"`,
    );
  }
}

export function validateStateMachineDefinition<L extends string>(
  definition: StateMachineDefinition<L>,
): void {
  if (!definition.id || typeof definition.id !== 'string') {
    throw new Error('State machine definition id must be a non-empty string');
  }

  if (!(definition.initial in definition.states)) {
    throw new Error(
      `State machine definition ${definition.id}: initial state "${definition.initial}" does not exist`,
    );
  }

  const failureState = definition.failureState;
  if (failureState !== undefined && !(failureState in definition.states)) {
    throw new Error(
      `State machine definition ${definition.id}: failure state "${failureState}" does not exist`,
    );
  }

  for (const [stateName, stateDef] of Object.entries<StateDefinition<L>>(
    definition.states,
  )) {
    const allowed: readonly string[] = stateDef.allowed;

    for (const target of allowed) {
      assertTargetExists(definition.id, definition.states, target, stateName);
    }

    if (
      failureState !== undefined &&
      allowed.length > 0 &&
      !allowed.includes(failureState)
    ) {
      throw new Error(
        `State machine definition ${definition.id}: failure state "${failureState}" is not reachable from "${stateName}"`,
      );
    }
  }
}

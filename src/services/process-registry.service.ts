import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { getProcessTypeId } from '../decorators/process-type.decorator';
import { DuplicateRegistrationError } from '../errors/duplicate-registration.error';
import { ProcessTypeNotRegisteredError } from '../errors/process-type-not-registered.error';
import type { ResolvedProcessModuleOptions } from '../interfaces/process-module-options.interface';
import type { ProcessConstructor } from '../process/process';
import { PROCESS_MODULE_OPTIONS } from '../process.constants';

export interface RegisteredProcessType {
  typeId: string;
  targetClass: ProcessConstructor;
}

@Injectable()
export class ProcessRegistry {
  private readonly logger = new Logger(ProcessRegistry.name);
  private readonly registrations = new Map<string, RegisteredProcessType>();

  constructor(
    @Optional()
    @Inject(PROCESS_MODULE_OPTIONS)
    options?: Pick<ResolvedProcessModuleOptions, 'processes'>,
  ) {
    for (const targetClass of options?.processes ?? []) {
      this.register(targetClass);
    }
  }

  /** Registers a process class under its `@ProcessType` id. */
  register(
    targetClass: ProcessConstructor,
    typeId: string = getProcessTypeId(targetClass),
  ): void {
    const existing = this.registrations.get(typeId);
    if (existing?.targetClass === targetClass) return;
    if (existing) {
      throw new DuplicateRegistrationError(
        typeId,
        existing.targetClass.name,
        targetClass.name,
      );
    }
    this.registrations.set(typeId, { typeId, targetClass });
    this.logger.log(`Registered process type: ${targetClass.name} -> ${typeId}`);
  }

  get(typeId: string): RegisteredProcessType | undefined {
    return this.registrations.get(typeId);
  }

  getAll(): RegisteredProcessType[] {
    return Array.from(this.registrations.values());
  }

  getOrThrow(typeId: string): RegisteredProcessType {
    const registration = this.registrations.get(typeId);
    if (!registration) {
      throw new ProcessTypeNotRegisteredError(typeId);
    }
    return registration;
  }
}

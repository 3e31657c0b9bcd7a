import 'reflect-metadata';
import { SetMetadata } from '@nestjs/common';
import { PROCESS_TYPE_METADATA } from '../process.constants';
import { deriveTypeId } from '../utils/derive-type-id';

export interface ProcessTypeOptions {
  /** Stable id written to bundles. If omitted, derived from class name. */
  typeId?: string;
}

export function ProcessType(options: ProcessTypeOptions = {}): ClassDecorator {
  return (target: Function) => {
    const typeId = options.typeId ?? deriveTypeId(target.name);
    SetMetadata(PROCESS_TYPE_METADATA, typeId)(target);
    Reflect.defineMetadata(PROCESS_TYPE_METADATA, typeId, target);
  };
}

export function getProcessTypeId(target: Function): string {
  const typeId: unknown = Reflect.getMetadata(PROCESS_TYPE_METADATA, target);
  return typeof typeId === 'string' ? typeId : deriveTypeId(target.name);
}

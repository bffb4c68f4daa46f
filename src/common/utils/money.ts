import { BadRequestException } from '@nestjs/common';

// суммы всегда целые, в минимальных единицах
export function assertAmount(value: number, name: string): void {
  if (!Number.isSafeInteger(value)) {
    throw new BadRequestException(`${name} must be an integer amount`);
  }
  if (value <= 0) {
    throw new BadRequestException(`${name} must be positive`);
  }
}

export function assertNonNegativeAmount(value: number, name: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new BadRequestException(`${name} must be a non-negative integer amount`);
  }
}

import { NotFoundException } from '@nestjs/common';

export class NoMatchError extends NotFoundException {
  constructor(readonly query: string) {
    super(`No match for "${query}": corpus is empty`);
  }
}

import { NotFoundException, UnprocessableEntityException } from '@nestjs/common';

export class UnknownSampleIdError extends NotFoundException {
  constructor(readonly sampleId: string) {
    super(`Sample with id ${sampleId} not found`);
  }
}

export class UnknownCategoryError extends NotFoundException {
  constructor(readonly category: string) {
    super(`Category ${category} not found`);
  }
}

export class CorpusLoadError extends UnprocessableEntityException {
  constructor(readonly path: string, reason: string) {
    super(`Failed to load corpus from ${path}: ${reason}`);
  }
}

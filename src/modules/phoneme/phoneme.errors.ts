import { BadRequestException } from '@nestjs/common';

export class MalformedTranscriptionError extends BadRequestException {
  constructor(readonly transcription: string) {
    super('Transcription is empty: nothing to tokenize');
  }
}

import { IsString } from 'class-validator';

export class TranscriptionDto {
  @IsString()
  transcription!: string;
}

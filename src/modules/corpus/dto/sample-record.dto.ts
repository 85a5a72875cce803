import { IsString, IsInt, IsNumber, IsPositive, IsNotEmpty, Matches } from 'class-validator';

const NOT_BLANK = /\S/;

// Запись метаданных корпуса в исходном виде (JSON-массив или JSON Lines).
// Имена полей совпадают с файлом, поэтому snake_case.
export class SampleRecordDto {
  @IsString()
  script_title!: string;

  @IsString()
  @Matches(NOT_BLANK, { message: 'transcription must not be blank' })
  transcription!: string;

  @IsString()
  @IsNotEmpty()
  utterance_name!: string;

  @IsString()
  @Matches(NOT_BLANK, { message: 'words must not be blank' })
  words!: string;

  @IsString()
  phone_sequence!: string;

  @IsInt()
  sentence_idx!: number;

  @IsNumber()
  @IsPositive()
  sentence_estimated_duration!: number;

  @IsString()
  locale!: string;

  @IsInt()
  paragraph_idx!: number;
}

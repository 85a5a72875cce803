import { IsString } from 'class-validator';

export class MatchQueryDto {
  @IsString()
  query!: string;
}

import { IsBoolean, IsOptional } from 'class-validator';

export class ReloadCorpusDto {
  @IsBoolean()
  @IsOptional()
  async?: boolean = false;  // Перезагрузить через очередь?
}

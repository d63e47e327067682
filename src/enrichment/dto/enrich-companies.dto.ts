import { ArrayNotEmpty, IsArray, IsString } from 'class-validator';

export class EnrichCompaniesDto {
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  companies!: string[];
}

import { Type } from 'class-transformer';
import { ArrayMaxSize, ArrayMinSize, IsArray, IsOptional, IsString, MaxLength, ValidateNested } from 'class-validator';

export class SkillQueryDto {
  @IsString()
  @MaxLength(120)
  skill_name!: string;

  @IsString()
  @MaxLength(1000)
  description!: string;

  // unknown categories are accepted and resolved to DEFAULT
  @IsString()
  @IsOptional()
  @MaxLength(20)
  skill_category?: string;
}

export class CheckAvailabilityDto {
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(20)
  @ValidateNested({ each: true })
  @Type(() => SkillQueryDto)
  skills!: SkillQueryDto[];
}

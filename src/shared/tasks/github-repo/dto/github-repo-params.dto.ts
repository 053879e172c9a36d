import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';

export class GithubRepoParamsDto {
  @IsString()
  @IsNotEmpty()
  repo!: string;

  @IsOptional()
  @IsBoolean()
  include_releases?: boolean;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  max_releases?: number;
}

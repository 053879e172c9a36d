import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
} from 'class-validator';

export class ScrapeSiteParamsDto {
  @IsUrl({ protocols: ['http', 'https'], require_protocol: true })
  url!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  wait_for_selector?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(20)
  scroll_iterations?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(1000)
  max_links?: number;
}

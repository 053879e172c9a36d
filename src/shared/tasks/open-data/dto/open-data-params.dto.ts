import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  ValidateIf,
} from 'class-validator';

const PORTAL_ID = /^[A-Za-z0-9_-]+$/;

export class OpenDataParamsDto {
  @ValidateIf((dto: OpenDataParamsDto) => dto.publisher_id === undefined)
  @IsString()
  @IsNotEmpty()
  @Matches(PORTAL_ID, { message: 'dataset_id must be a portal dataset id' })
  dataset_id?: string;

  @ValidateIf((dto: OpenDataParamsDto) => dto.dataset_id === undefined)
  @IsString()
  @IsNotEmpty()
  @Matches(PORTAL_ID, { message: 'publisher_id must be a portal publisher id' })
  publisher_id?: string;

  /** Inclusive `[first, last]` slice of the publisher's dataset list. */
  @IsOptional()
  @IsArray()
  @ArrayMinSize(2)
  @ArrayMaxSize(2)
  @IsInt({ each: true })
  @Min(0, { each: true })
  dataset_range?: number[];

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(1000)
  max_datasets?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(500)
  max_resources?: number;
}

import {
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
} from 'class-validator';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export class BookingHotelsParamsDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  location?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  max_results?: number;

  @IsOptional()
  @Matches(ISO_DATE, { message: 'check_in must be a YYYY-MM-DD date' })
  check_in?: string;

  @IsOptional()
  @Matches(ISO_DATE, { message: 'check_out must be a YYYY-MM-DD date' })
  check_out?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(30)
  adults?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(30)
  rooms?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  min_price?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  max_price?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(10)
  min_rating?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(500)
  max_review_pages?: number;
}

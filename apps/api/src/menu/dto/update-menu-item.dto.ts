import {
  IsBoolean,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
  ValidateIf,
} from 'class-validator';
import { MAX_MONEY_AMOUNT } from '../../common/utils/money';

// name, price and isAvailable may be left out but never nulled;
// description and category accept null to clear them
export class UpdateMenuItemDto {
  @ValidateIf((dto: UpdateMenuItemDto) => dto.name !== undefined)
  @IsString()
  @IsNotEmpty()
  @MaxLength(120)
  name?: string;

  @IsOptional()
  @IsString()
  description?: string | null;

  @ValidateIf((dto: UpdateMenuItemDto) => dto.price !== undefined)
  @IsNumber({ maxDecimalPlaces: 2, allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(MAX_MONEY_AMOUNT)
  price?: number;

  @ValidateIf((dto: UpdateMenuItemDto) => dto.isAvailable !== undefined)
  @IsBoolean()
  isAvailable?: boolean;

  @IsOptional()
  @IsString()
  @MaxLength(80)
  category?: string | null;
}

import { BadRequestException } from '@nestjs/common';
import { formatCents, MAX_MONEY_CENTS } from '../common/utils/money';

/** The order total would not fit the numeric(10,2) total column. */
export class OrderTooLargeException extends BadRequestException {
  constructor() {
    super({
      code: 'ORDER_TOTAL_TOO_LARGE',
      message: `Order total cannot exceed ${formatCents(MAX_MONEY_CENTS)}`,
    });
  }
}

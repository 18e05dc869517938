import { BadRequestException } from '@nestjs/common';

/** A requested menu item does not exist or is switched off. */
export class MenuItemUnavailableException extends BadRequestException {
  constructor(readonly menuItemId: number) {
    super({
      code: 'MENU_ITEM_UNAVAILABLE',
      message: `Menu item ${menuItemId} not found or unavailable`,
      menuItemId,
    });
  }
}

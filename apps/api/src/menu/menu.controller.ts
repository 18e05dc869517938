// apps/api/src/menu/menu.controller.ts
import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
  Patch,
  Post,
} from '@nestjs/common';
import { MenuService } from './menu.service';
import { CreateMenuItemDto } from './dto/create-menu-item.dto';
import { UpdateMenuItemDto } from './dto/update-menu-item.dto';

@Controller('menu')
export class MenuController {
  constructor(private readonly menuService: MenuService) {}

  /** GET /api/v1/menu */
  @Get()
  list() {
    return this.menuService.listAvailable();
  }

  /** GET /api/v1/menu/:id */
  @Get(':id')
  findOne(@Param('id', ParseIntPipe) id: number) {
    return this.menuService.getById(id);
  }

  /** POST /api/v1/menu (409 when the name exists) */
  @Post()
  @HttpCode(201)
  create(@Body() dto: CreateMenuItemDto) {
    return this.menuService.create(dto);
  }

  /**
   * PATCH /api/v1/menu/:id
   * Price changes only affect orders placed afterwards.
   */
  @Patch(':id')
  update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateMenuItemDto,
  ) {
    return this.menuService.update(id, dto);
  }
}

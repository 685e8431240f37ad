import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  Headers,
  HttpCode,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import {
  ApiHeader,
  ApiOperation,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { ProductService } from './product.service';
import { CreateProductDto } from './dtos/create-product.dto';
import { UpdateProductDto } from './dtos/update-product.dto';
import { AdjustStockDto } from './dtos/adjust-stock.dto';
import { SetActiveDto } from './dtos/set-active.dto';
import { ListProductsQueryDto } from './dtos/list-products.dto';

/** Parses an `If-Match` header carrying a product version, quoted or bare. */
export function parseIfMatch(header: string | undefined): number | undefined {
  if (header === undefined || header.trim() === '') {
    return undefined;
  }
  const value = header.trim().replace(/^W\//, '').replace(/^"(.*)"$/, '$1');
  if (!/^\d+$/.test(value)) {
    throw new BadRequestException('If-Match must be an integer version');
  }
  return Number(value);
}

@ApiTags('products')
@Controller('products')
export class ProductController {
  constructor(private readonly productService: ProductService) {}

  @Post()
  @ApiOperation({ summary: 'Create a product' })
  @ApiResponse({ status: 201, description: 'Product created' })
  @ApiResponse({ status: 409, description: 'SKU already exists' })
  @ApiResponse({ status: 422, description: 'Validation failed' })
  async create(@Body() createDto: CreateProductDto) {
    return await this.productService.create(createDto);
  }

  @Get()
  @ApiOperation({ summary: 'List products with filters, sorting and paging' })
  async list(@Query() query: ListProductsQueryDto) {
    return await this.productService.list(query);
  }

  @Get('sku/:sku')
  @ApiOperation({ summary: 'Get a product by SKU' })
  @ApiResponse({ status: 404, description: 'Product not found' })
  async getBySku(@Param('sku') sku: string) {
    return await this.productService.getBySku(sku);
  }

  @Put('sku/:sku')
  @ApiOperation({ summary: 'Create or update a product by SKU' })
  async upsertBySku(
    @Param('sku') sku: string,
    @Body() createDto: CreateProductDto,
  ) {
    return await this.productService.upsertBySku({ ...createDto, sku });
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a product by id' })
  @ApiResponse({ status: 404, description: 'Product not found' })
  async get(@Param('id', ParseIntPipe) id: number) {
    return await this.productService.get(id);
  }

  @Put(':id')
  @ApiOperation({ summary: 'Update a product' })
  @ApiHeader({
    name: 'If-Match',
    required: false,
    description: 'Expected product version',
  })
  @ApiResponse({ status: 404, description: 'Product not found' })
  @ApiResponse({ status: 409, description: 'SKU taken or version conflict' })
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() updateDto: UpdateProductDto,
    @Headers('if-match') ifMatch?: string,
  ) {
    return await this.productService.update(
      id,
      updateDto,
      parseIfMatch(ifMatch),
    );
  }

  @Delete(':id')
  @ApiOperation({ summary: 'Delete a product' })
  @ApiResponse({ status: 404, description: 'Product not found' })
  async delete(@Param('id', ParseIntPipe) id: number) {
    return await this.productService.delete(id);
  }

  @Patch(':id/stock')
  @HttpCode(200)
  @ApiOperation({ summary: 'Adjust stock by a signed delta' })
  @ApiResponse({ status: 409, description: 'Insufficient stock or version conflict' })
  async adjustStock(
    @Param('id', ParseIntPipe) id: number,
    @Body() adjustDto: AdjustStockDto,
  ) {
    return await this.productService.adjustStock(id, adjustDto.delta);
  }

  @Patch(':id/active')
  @HttpCode(200)
  @ApiOperation({ summary: 'Activate or deactivate a product' })
  async setActive(
    @Param('id', ParseIntPipe) id: number,
    @Body() activeDto: SetActiveDto,
  ) {
    return await this.productService.setActive(id, activeDto.isActive);
  }
}

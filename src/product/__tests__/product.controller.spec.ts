import { BadRequestException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { parseIfMatch, ProductController } from '../product.controller';
import { ProductService } from '../product.service';

describe('parseIfMatch', () => {
  it('should return undefined when the header is absent or blank', () => {
    expect(parseIfMatch(undefined)).toBeUndefined();
    expect(parseIfMatch('  ')).toBeUndefined();
  });

  it('should accept bare, quoted and weak versions', () => {
    expect(parseIfMatch('3')).toBe(3);
    expect(parseIfMatch('"4"')).toBe(4);
    expect(parseIfMatch('W/"5"')).toBe(5);
  });

  it('should reject a non-integer version', () => {
    expect(() => parseIfMatch('abc')).toThrow(BadRequestException);
    expect(() => parseIfMatch('1.5')).toThrow(BadRequestException);
  });
});

describe('ProductController', () => {
  let controller: ProductController;
  const productService = {
    update: jest.fn(),
    upsertBySku: jest.fn(),
    adjustStock: jest.fn(),
    setActive: jest.fn(),
  };

  beforeEach(async () => {
    jest.resetAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      controllers: [ProductController],
      providers: [{ provide: ProductService, useValue: productService }],
    }).compile();

    controller = module.get(ProductController);
  });

  it('should forward the If-Match version to update', async () => {
    await controller.update(7, { price: 12 }, '"2"');

    expect(productService.update).toHaveBeenCalledWith(7, { price: 12 }, 2);
  });

  it('should take the SKU of an upsert from the path', async () => {
    await controller.upsertBySku('PATH-SKU', {
      sku: 'BODY-SKU',
      name: 'Widget',
      price: 3,
      quantity: 1,
    });

    expect(productService.upsertBySku).toHaveBeenCalledWith({
      sku: 'PATH-SKU',
      name: 'Widget',
      price: 3,
      quantity: 1,
    });
  });

  it('should pass the signed delta to adjustStock', async () => {
    await controller.adjustStock(3, { delta: -2 });

    expect(productService.adjustStock).toHaveBeenCalledWith(3, -2);
  });

  it('should pass the flag to setActive', async () => {
    await controller.setActive(3, { isActive: false });

    expect(productService.setActive).toHaveBeenCalledWith(3, false);
  });
});

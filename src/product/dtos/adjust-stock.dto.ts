import { ApiProperty } from '@nestjs/swagger';
import { IsInt } from 'class-validator';

export class AdjustStockDto {
  @ApiProperty({
    description: 'Signed quantity change: negative consumes, positive replenishes',
    example: -2,
    type: Number,
  })
  @IsInt()
  delta!: number;
}

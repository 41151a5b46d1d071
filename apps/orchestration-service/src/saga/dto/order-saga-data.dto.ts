import {
  ArrayNotEmpty,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
  validateSync,
} from 'class-validator';
import { plainToInstance, Type } from 'class-transformer';
import { JsonObject, formatValidationErrors } from '@conductor/shared';
import { SagaState, SagaValidationError } from '@conductor/saga';

export class OrderItemDto {
  @IsString()
  @IsNotEmpty()
  itemId!: string;

  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsInt()
  @Min(1)
  quantity!: number;

  @IsNumber()
  @Min(0)
  unitPrice!: number;
}

export class DeliveryLocationDto {
  @IsNumber()
  @Min(-90)
  @Max(90)
  latitude!: number;

  @IsNumber()
  @Min(-180)
  @Max(180)
  longitude!: number;

  @IsString()
  @IsNotEmpty()
  address!: string;

  @IsOptional()
  @IsString()
  city?: string;
}

export class OrderSagaDataDto {
  @IsString()
  @IsNotEmpty()
  orderId!: string;

  @IsString()
  @IsNotEmpty()
  customerId!: string;

  @IsString()
  @IsNotEmpty()
  restaurantId!: string;

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => OrderItemDto)
  items!: OrderItemDto[];

  @ValidateNested()
  @Type(() => DeliveryLocationDto)
  deliveryLocation!: DeliveryLocationDto;

  @IsNumber()
  totalAmount!: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  maxDeliveryTimeMinutes?: number;

  @IsOptional()
  @IsString()
  specialInstructions?: string;
}

/**
 * Convert and validate a plain order; throws SagaValidationError listing every violation
 */
export function parseOrderSagaData(plain: object, sagaId?: string): OrderSagaDataDto {
  const order = plainToInstance(OrderSagaDataDto, plain);
  const errors = validateSync(order);
  if (errors.length > 0) {
    throw new SagaValidationError(`Invalid order data: ${formatValidationErrors(errors).join('; ')}`, sagaId);
  }
  return order;
}

export function readOrderSagaData(state: SagaState): OrderSagaDataDto {
  return parseOrderSagaData(state.data, state.sagaId);
}

export function toOrderSagaData(order: OrderSagaDataDto): JsonObject {
  const { deliveryLocation } = order;
  return {
    orderId: order.orderId,
    customerId: order.customerId,
    restaurantId: order.restaurantId,
    items: order.items.map(item => ({
      itemId: item.itemId,
      name: item.name,
      quantity: item.quantity,
      unitPrice: item.unitPrice,
    })),
    deliveryLocation: {
      latitude: deliveryLocation.latitude,
      longitude: deliveryLocation.longitude,
      address: deliveryLocation.address,
      ...(deliveryLocation.city !== undefined ? { city: deliveryLocation.city } : {}),
    },
    totalAmount: order.totalAmount,
    ...(order.maxDeliveryTimeMinutes !== undefined ? { maxDeliveryTimeMinutes: order.maxDeliveryTimeMinutes } : {}),
    ...(order.specialInstructions !== undefined ? { specialInstructions: order.specialInstructions } : {}),
  };
}

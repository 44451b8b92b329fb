import {
  ArrayMinSize,
  IsDateString,
  IsEnum,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUUID,
  Matches,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { SeatTier } from '../entities';

export class SeatRowLayoutDto {
  @ApiProperty({ example: 'A', description: 'Identificador da fileira' })
  @IsString()
  @Matches(/^[A-Z]{1,2}$/)
  row!: string;

  @ApiProperty({ example: 12, description: 'Quantidade de assentos na fileira' })
  @IsInt()
  @Min(1)
  @Max(60)
  @Type(() => Number)
  seats!: number;

  @ApiPropertyOptional({ enum: SeatTier, default: SeatTier.STANDARD, description: 'Categoria dos assentos' })
  @IsOptional()
  @IsEnum(SeatTier)
  tier?: SeatTier;

  @ApiPropertyOptional({ example: 5, default: 0, description: 'Acréscimo sobre o preço base' })
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Type(() => Number)
  priceDelta?: number;
}

export class CreateScreenDto {
  @ApiProperty({ example: 'Sala 1', description: 'Nome da sala' })
  @IsString()
  @MaxLength(100)
  name!: string;

  @ApiProperty({ type: [SeatRowLayoutDto], description: 'Layout de fileiras da sala' })
  @ValidateNested({ each: true })
  @ArrayMinSize(1)
  @Type(() => SeatRowLayoutDto)
  rows!: SeatRowLayoutDto[];
}

export class ScreenSeatDto {
  @ApiProperty()
  id!: string;

  @ApiProperty({ example: 'A1' })
  label!: string;

  @ApiProperty()
  row!: string;

  @ApiProperty()
  number!: number;

  @ApiProperty({ enum: SeatTier })
  tier!: SeatTier;

  @ApiProperty()
  priceDelta!: number;
}

export class ScreenResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  name!: string;

  @ApiProperty()
  totalSeats!: number;

  @ApiProperty({ type: [ScreenSeatDto] })
  seats!: ScreenSeatDto[];
}

export class CreateShowDto {
  @ApiProperty({ example: 'Avatar 3', description: 'Nome do filme' })
  @IsString()
  @MaxLength(255)
  movieTitle!: string;

  @ApiProperty({ description: 'Sala onde a sessão acontece' })
  @IsUUID()
  screenId!: string;

  @ApiProperty({ example: '2026-02-15T19:00:00Z', description: 'Horário da sessão' })
  @IsDateString()
  scheduledAt!: string;

  @ApiProperty({ example: 25.0, description: 'Preço base do ingresso' })
  @IsNumber()
  @Min(0)
  @Type(() => Number)
  basePrice!: number;
}

export class ShowResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  movieTitle!: string;

  @ApiProperty()
  screenId!: string;

  @ApiProperty()
  scheduledAt!: Date;

  @ApiProperty()
  basePrice!: number;

  @ApiProperty()
  isActive!: boolean;

  @ApiProperty()
  totalSeats!: number;

  @ApiProperty()
  bookedSeats!: number;

  @ApiProperty({ description: 'Assentos ainda não vendidos' })
  availableSeats!: number;

  @ApiProperty()
  createdAt!: Date;
}

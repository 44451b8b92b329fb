import { ArrayMinSize, IsArray, IsString, IsUUID, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class CreateHoldDto {
  @ApiProperty({ example: '550e8400-e29b-41d4-a716-446655440000', description: 'ID da sessão' })
  @IsUUID()
  showId!: string;

  @ApiProperty({
    example: ['7c9e6679-7425-40de-944b-e07fc1f90ae7'],
    description: 'IDs dos assentos a bloquear',
  })
  @IsArray()
  @ArrayMinSize(1)
  @IsUUID('all', { each: true })
  seatIds!: string[];

  @ApiProperty({ example: 'user123', description: 'ID do usuário' })
  @IsString()
  @MaxLength(255)
  actorId!: string;
}

export class HoldActorDto {
  @ApiProperty({ example: 'user123', description: 'ID do usuário dono do bloqueio' })
  @IsString()
  @MaxLength(255)
  actorId!: string;
}

export class HoldResponseDto {
  @ApiProperty({ description: 'Token do bloqueio, usado para pagar ou liberar' })
  token!: string;

  @ApiProperty()
  showId!: string;

  @ApiProperty({ type: [String] })
  seatIds!: string[];

  @ApiProperty()
  actorId!: string;

  @ApiProperty({ description: 'Expiração definida pelo servidor' })
  expiresAt!: Date;

  @ApiProperty()
  extensionCount!: number;
}

export class SeatConflictResponseDto {
  @ApiProperty({ example: 'CONFLICT' })
  status!: 'CONFLICT';

  @ApiProperty({ type: [String], description: 'Assentos que já estão ocupados' })
  seatIds!: string[];
}

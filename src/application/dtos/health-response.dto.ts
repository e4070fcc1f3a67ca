import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export type HealthStatus = 'healthy' | 'unhealthy';

export class ComponentHealthDto {
  @ApiProperty({
    description: 'Component status',
    enum: ['healthy', 'unhealthy'],
    example: 'healthy',
  })
  status!: HealthStatus;

  @ApiPropertyOptional({
    description: 'Latency in milliseconds',
    example: 2,
  })
  latencyMs?: number;

  @ApiPropertyOptional({
    description: 'Error message',
    example: 'Timeout',
  })
  message?: string;

  @ApiPropertyOptional({
    description: 'Last allocated intake number',
    example: 42,
  })
  lastAutoNumber?: number;
}

export class HealthResponseDto {
  @ApiProperty({
    description: 'Overall application status',
    enum: ['healthy', 'unhealthy'],
    example: 'healthy',
  })
  status!: HealthStatus;

  @ApiProperty({
    description: 'Check timestamp',
    example: '2025-01-15T10:30:00.000Z',
  })
  timestamp!: string;

  @ApiProperty({ description: 'Database component', type: ComponentHealthDto })
  database!: ComponentHealthDto;
}

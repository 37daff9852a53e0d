/**
 * @fileoverview Improve Protocol Request DTO
 */

import { Type } from 'class-transformer';
import { ArrayMinSize, IsArray, IsNotEmpty, IsOptional, IsString, ValidateNested } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class FixToApplyDto {
    @ApiProperty({ example: 'Missing negative control' })
    @IsString()
    @IsNotEmpty()
    issue!: string;

    @ApiPropertyOptional()
    @IsOptional()
    @IsString()
    description?: string;

    @ApiProperty({ example: 'Add an untreated well to every plate.' })
    @IsString()
    @IsNotEmpty()
    fix_suggestion!: string;

    @ApiPropertyOptional({ type: [String] })
    @IsOptional()
    @IsArray()
    @IsString({ each: true })
    implementation_steps?: string[];
}

export class ImproveProtocolRequestDto {
    @ApiProperty({ description: 'Protocol to edit (first 6000 characters are used)' })
    @IsString()
    @IsNotEmpty()
    original_protocol!: string;

    @ApiProperty({ type: [FixToApplyDto] })
    @IsArray()
    @ArrayMinSize(1)
    @ValidateNested({ each: true })
    @Type(() => FixToApplyDto)
    fixes_to_apply!: FixToApplyDto[];
}

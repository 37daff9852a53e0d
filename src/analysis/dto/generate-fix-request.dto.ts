import { IsString, IsNotEmpty } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class GenerateFixRequestDto {
    @ApiProperty({ example: 'Missing negative control', description: 'Title of the identified issue' })
    @IsString()
    @IsNotEmpty()
    issue!: string;

    @ApiProperty({ example: 'No untreated sample is run alongside the treated wells.' })
    @IsString()
    description!: string;

    @ApiProperty({ description: 'Protocol text the fix applies to (first 4000 characters are used)' })
    @IsString()
    @IsNotEmpty()
    protocol_context!: string;
}

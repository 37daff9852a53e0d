import { IsString, IsNotEmpty } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class ExtractReagentsRequestDto {
    @ApiProperty({ description: 'Protocol text containing a Materials section' })
    @IsString()
    @IsNotEmpty()
    protocol_text!: string;
}

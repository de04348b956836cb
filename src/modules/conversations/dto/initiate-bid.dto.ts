import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsDefined,
  IsEmail,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class EventMetadataDto {
  @ApiProperty({ description: 'Event name', example: 'Spring Offsite' })
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiProperty({ description: 'Event dates', type: [String], example: ['2026-05-12', '2026-05-13'] })
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  dates!: string[];

  @ApiProperty({ description: 'Kind of event', example: 'corporate retreat' })
  @IsString()
  @IsNotEmpty()
  event_type!: string;

  @ApiProperty({ description: 'Name the emails are signed with' })
  @IsString()
  @IsNotEmpty()
  planner_name!: string;

  @ApiProperty({ description: 'Planner contact email' })
  @IsEmail()
  planner_email!: string;

  @ApiPropertyOptional({ description: 'Planner contact phone' })
  @IsOptional()
  @IsString()
  planner_phone?: string;
}

export class VendorInfoDto {
  @ApiProperty({ description: 'Vendor name', example: 'Lakeside Lodge' })
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiProperty({ description: 'Address the bid request is sent to' })
  @IsEmail()
  email!: string;

  @ApiPropertyOptional({ description: 'Vendor phone' })
  @IsOptional()
  @IsString()
  phone?: string;

  @ApiProperty({ description: 'Service the vendor provides', example: 'hotel' })
  @IsString()
  @IsNotEmpty()
  service_type!: string;
}

export class BidQuestionDto {
  @ApiProperty({ description: 'Question id, unique within the request', example: 1 })
  @IsInt()
  @Min(1)
  id!: number;

  @ApiProperty({ description: 'Question text' })
  @IsString()
  @IsNotEmpty()
  text!: string;

  @ApiPropertyOptional({ description: 'Whether the conversation needs an answer', default: false })
  @IsOptional()
  @IsBoolean()
  required?: boolean;

  @ApiPropertyOptional({ description: 'Suggested answer options', type: [String] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  options?: string[];

  @ApiPropertyOptional({ description: 'Nested questions', type: () => [BidQuestionDto] })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => BidQuestionDto)
  sub_questions?: BidQuestionDto[];
}

export class InitiateBidDto {
  @ApiProperty({ type: EventMetadataDto })
  @IsDefined()
  @IsObject()
  @ValidateNested()
  @Type(() => EventMetadataDto)
  event_metadata!: EventMetadataDto;

  @ApiProperty({ type: VendorInfoDto })
  @IsDefined()
  @IsObject()
  @ValidateNested()
  @Type(() => VendorInfoDto)
  vendor_info!: VendorInfoDto;

  @ApiProperty({ type: [BidQuestionDto] })
  @IsDefined()
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => BidQuestionDto)
  questions!: BidQuestionDto[];

  @ApiPropertyOptional({
    description: 'Opaque data echoed back to the planning backend',
    type: 'object',
    additionalProperties: true,
  })
  @IsOptional()
  @IsObject()
  callback_data?: Record<string, unknown>;
}

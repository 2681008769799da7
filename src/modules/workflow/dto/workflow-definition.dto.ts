import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsIn,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { EdgeHint } from '../interfaces/workflow.interfaces';

export class NodePositionDto {
  @IsNumber()
  x!: number;

  @IsNumber()
  y!: number;
}

export class NodeDefinitionDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  type!: string;

  @IsOptional()
  @IsObject()
  parameters?: Record<string, unknown>;

  @IsOptional()
  @IsString()
  name?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => NodePositionDto)
  position?: NodePositionDto;

  @IsOptional()
  @IsObject()
  metadata?: Record<string, unknown>;
}

export class EdgeDefinitionDto {
  @IsString()
  @IsNotEmpty()
  source!: string;

  @IsString()
  @IsNotEmpty()
  target!: string;

  @IsOptional()
  @IsIn(['sequential', 'parallel'])
  hint?: EdgeHint;
}

export class GraphWorkflowDefinitionDto {
  @IsOptional()
  @IsString()
  name?: string;

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => NodeDefinitionDto)
  nodes!: NodeDefinitionDto[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => EdgeDefinitionDto)
  edges?: EdgeDefinitionDto[];
}

export class PipelineStepDefinitionDto {
  @IsString()
  @IsNotEmpty()
  type!: string;

  @IsOptional()
  @IsObject()
  parameters?: Record<string, unknown>;

  @IsOptional()
  @IsString()
  name?: string;
}

/**
 * node_defs is a free-form map here; each entry is validated on its own
 * against PipelineStepDefinitionDto.
 */
export class PipelineWorkflowDefinitionDto {
  @IsOptional()
  @IsString()
  name?: string;

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  steps!: string[];

  @IsObject()
  node_defs!: Record<string, unknown>;
}

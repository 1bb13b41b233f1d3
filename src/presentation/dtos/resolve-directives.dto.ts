import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  ArrayNotEmpty,
  IsArray,
  IsEnum,
  IsIn,
  IsOptional,
  IsString,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import { DirectiveSelection } from '../../core/domain/entities/directive-selection.entity';
import {
  AssignableDirective,
  CommentCategory,
  CommentSeverity,
  Directive,
} from '../../core/domain/entities/review-comment.entity';
import { InvalidSelectionError } from '../../core/domain/errors/triage.errors';

const ASSIGNABLE_DIRECTIVES: AssignableDirective[] = [Directive.AUTO_FIX, Directive.WONT_FIX, Directive.MANUAL];

export class DirectiveSelectionDto {
  @ApiProperty({
    description: 'The directive to assign',
    enum: ASSIGNABLE_DIRECTIVES,
    example: 'auto_fix',
  })
  @IsIn(ASSIGNABLE_DIRECTIVES, {
    message: 'directive must be one of "auto_fix", "wont_fix" or "manual"',
  })
  directive!: AssignableDirective;

  @ApiProperty({ description: 'Target these comment ids', type: [String], required: false })
  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  ids?: string[];

  @ApiProperty({ description: 'Target every comment of these categories', enum: CommentCategory, isArray: true, required: false })
  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @IsEnum(CommentCategory, { each: true })
  categories?: CommentCategory[];

  @ApiProperty({ description: 'Target every comment of these severities', enum: CommentSeverity, isArray: true, required: false })
  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @IsEnum(CommentSeverity, { each: true })
  severities?: CommentSeverity[];

  @ApiProperty({
    description: "Free-form note; the rationale posted for a won't-fix directive",
    example: 'Out of scope for this change, tracked separately.',
    required: false,
  })
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  note?: string;
}

export class ResolveDirectivesDto {
  @ApiProperty({ type: [DirectiveSelectionDto] })
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => DirectiveSelectionDto)
  selections!: DirectiveSelectionDto[];
}

/**
 * A selection targets comments along exactly one axis.
 */
export function toDirectiveSelection(dto: DirectiveSelectionDto, index: number): DirectiveSelection {
  const axes = [dto.ids, dto.categories, dto.severities].filter((axis) => axis !== undefined);
  if (axes.length !== 1) {
    throw new InvalidSelectionError(
      `Selection ${index} must target exactly one of ids, categories or severities (got ${axes.length})`,
    );
  }

  const base = { directive: dto.directive, note: dto.note };
  if (dto.ids) {
    return { ...base, target: { kind: 'ids', ids: dto.ids } };
  }
  if (dto.categories) {
    return { ...base, target: { kind: 'categories', categories: dto.categories } };
  }
  if (dto.severities) {
    return { ...base, target: { kind: 'severities', severities: dto.severities } };
  }
  throw new InvalidSelectionError(`Selection ${index} has no target`);
}

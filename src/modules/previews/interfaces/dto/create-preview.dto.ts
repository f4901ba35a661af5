import {
  IsBoolean,
  IsEmail,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Length,
  Max,
  Min,
} from 'class-validator';
import { IMAGE_STYLES, type ImageStyle } from '../../../image-generation/domain/model-registry';
import { CHILD_GENDERS, type ChildGender } from '../../domain/entities/preview.entity';

/** Seeds are stored in a signed 32-bit column. */
export const MAX_SEED = 2_147_483_647;

export class CreatePreviewDto {
  @IsString()
  @Length(1, 60)
  childName!: string;

  @IsInt()
  @Min(2)
  @Max(12)
  childAge!: number;

  @IsIn(CHILD_GENDERS)
  childGender!: ChildGender;

  @IsUrl({ require_tld: false })
  photoUrl!: string;

  @IsString()
  themeId!: string;

  @IsOptional()
  @IsIn(IMAGE_STYLES)
  style?: ImageStyle;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(MAX_SEED)
  seed?: number;

  @IsOptional()
  @IsEmail()
  customerEmail?: string;

  @IsOptional()
  @IsBoolean()
  notifyOnComplete?: boolean;

  /** Guest browser session, used to list the visitor's creations. */
  @IsOptional()
  @IsString()
  @Length(1, 128)
  sessionId?: string;
}

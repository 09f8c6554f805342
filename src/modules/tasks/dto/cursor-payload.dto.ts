import { IsInt, IsNotEmpty, IsString, Min } from 'class-validator';

/**
 * Shape of a decoded cursor document. Field names are part of the wire
 * format and must not change without bumping `v`.
 */
export class CursorPayloadDto {
  @IsInt()
  @Min(1)
  v!: number;

  @IsString()
  @IsNotEmpty()
  createdAt!: string;

  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  projectId!: string;

  @IsString()
  @IsNotEmpty()
  qhash!: string;

  @IsInt()
  iat!: number;
}

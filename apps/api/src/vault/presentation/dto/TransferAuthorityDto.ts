import { IsNotEmpty, IsString, Matches, MaxLength } from 'class-validator';

export class TransferAuthorityDto {
  @IsString()
  @IsNotEmpty()
  @Matches(/\S/, { message: 'newAuthority must not be blank' })
  @MaxLength(255)
  newAuthority!: string;
}

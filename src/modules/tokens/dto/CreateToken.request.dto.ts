import { Matches } from 'class-validator';

export class CreateTokenRequestDto {
  @Matches(/^[0-9a-f]{24}$/, { message: 'userId must be an entity id' })
  public readonly userId!: string;
}

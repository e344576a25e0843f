import { IsString, MinLength, Matches } from 'class-validator';
import { LOGIN_CONSTANTS } from '../constants/login.constants';

export class PhoneNumberInputDto {
  @IsString()
  @Matches(/^\+/, { message: 'phone number must start with +' })
  @MinLength(LOGIN_CONSTANTS.PHONE.MIN_LENGTH)
  phoneNumber: string;

  constructor(phoneNumber: string) {
    this.phoneNumber = phoneNumber;
  }
}

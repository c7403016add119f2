import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class PayBookingDto {
  @IsString()
  @IsNotEmpty({ message: 'PNR is required' })
  @MaxLength(20)
  pnr!: string;

  /** Checked by the payment simulation so a bad number re-renders the payment form. */
  @IsString()
  @MaxLength(40)
  cardNumber!: string;
}

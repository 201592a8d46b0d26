import { IsBase64, IsNotEmpty } from 'class-validator';

export class ValidateDocumentDto {
  // base64 encoded UBL, as delivered by the access point
  @IsBase64()
  @IsNotEmpty()
  document!: string;
}

export class GeneratedTextDto {
  generated_text!: string;
}

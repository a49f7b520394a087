// Cắt khoảng trắng hai đầu trước khi validate, để "   " bị @IsNotEmpty() chặn (400)
import type { TransformFnParams } from 'class-transformer';

export const trimString = ({ value }: TransformFnParams): unknown =>
  typeof value === 'string' ? value.trim() : value;

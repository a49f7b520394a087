// Chuẩn hoá tham số danh sách id từ nhiều nguồn về string[]
// - JSON body: ["a", "b"]
// - multipart: field lặp lại (mảng) hoặc chỉ 1 field (string)
// - query string: "a,b" hoặc ?x=a&x=b
import type { TransformFnParams } from 'class-transformer';

export const toIdList = ({ value }: TransformFnParams): unknown => {
  if (value === undefined || value === null || value === '') {
    return [];
  }
  const items: unknown[] = Array.isArray(value) ? value : [value];
  return items.flatMap((item) =>
    typeof item === 'string'
      ? item
          .split(',')
          .map((part) => part.trim())
          .filter((part) => part.length > 0)
      : [item],
  );
};

// Chuyển tiêu đề (có thể có dấu tiếng Việt) thành slug an toàn để đặt tên file
// VD: "Đất Rừng Phương Nam" → "dat-rung-phuong-nam"
export function slugify(value: string, fallback = 'file'): string {
  const slug = value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '') // bỏ dấu
    .replace(/[đĐ]/g, 'd')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug.length > 0 ? slug : fallback;
}

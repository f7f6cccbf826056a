/** Ten-row schematic used across the suites */
export const EXAMPLE = [
  '467..114..',
  '...*......',
  '..35..633.',
  '......#...',
  '617*......',
  '.....+.58.',
  '..592.....',
  '......755.',
  '...$.*....',
  '.664.598..',
].join('\n');

export const EXAMPLE_PART_NUMBERS = [467, 35, 633, 617, 592, 755, 664, 598];

export function rows(...lines: string[]): string {
  return lines.join('\n');
}

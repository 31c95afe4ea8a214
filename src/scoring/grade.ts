const GRADES: ReadonlyArray<readonly [number, string]> = [
  [90, '🌟'],
  [80, '⭐'],
  [70, '🎯'],
  [60, '🎨'],
  [50, '🌱'],
  [40, '🍀'],
  [30, '🌿'],
  [20, '🍂'],
  [10, '🍁'],
];

const LOWEST_GRADE = '🌑';

export function gradeFor(total: number): string {
  for (const [threshold, grade] of GRADES) {
    if (total >= threshold) return grade;
  }
  return LOWEST_GRADE;
}

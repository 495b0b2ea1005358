/**
 * 키별로 타임스탬프가 가장 큰 항목 하나만 남긴다.
 * - 저장소의 행 정렬 순서에 의존하지 않는다.
 * - 타임스탬프가 같으면 먼저 나온 항목을 유지한다.
 */
export function keepLatestByKey<T>(
  items: Iterable<T>,
  keyOf: (item: T) => string,
  timeOf: (item: T) => number,
): Map<string, T> {
  const latest = new Map<string, T>();

  for (const item of items) {
    const key = keyOf(item);
    const current = latest.get(key);
    if (current === undefined || timeOf(item) > timeOf(current)) {
      latest.set(key, item);
    }
  }

  return latest;
}

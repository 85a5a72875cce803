/**
 * Расстояние Левенштейна между двумя последовательностями (фоны, символы)
 */
export function levenshtein<T>(a: readonly T[], b: readonly T[]): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  // Две строки матрицы вместо всей
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    current[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1,        // удаление
        current[j - 1] + 1,     // вставка
        previous[j - 1] + cost, // замена
      );
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}

/**
 * Расстояние, делённое на длину более длинной последовательности (0.0 - 1.0).
 * Две пустые последовательности считаются одинаковыми.
 */
export function normalizeDistance(distance: number, a: readonly unknown[], b: readonly unknown[]): number {
  const longer = Math.max(a.length, b.length);
  return longer === 0 ? 0 : distance / longer;
}

/**
 * Коэффициент Жаккара: |A ∩ B| / |A ∪ B| (0.0 - 1.0)
 */
export function jaccard<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): number {
  if (a.size === 0 && b.size === 0) return 0;

  let intersection = 0;
  for (const item of a) {
    if (b.has(item)) intersection++;
  }

  return intersection / (a.size + b.size - intersection);
}

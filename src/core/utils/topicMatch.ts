/**
 * Match a dotted routing key against a topic filter.
 *
 * `*` matches exactly one word and `#` matches zero or more words, so
 * `sensors.#` matches `sensors`, `sensors.temp` and `sensors.temp.kitchen`.
 */
export function topicMatches(filter: string, routingKey: string): boolean {
  return matchWords(filter.split('.'), 0, routingKey.split('.'), 0);
}

function matchWords(filter: string[], fi: number, key: string[], ki: number): boolean {
  if (fi === filter.length) return ki === key.length;

  const word = filter[fi];

  if (word === '#') {
    // Try every split point, zero words first
    for (let skip = ki; skip <= key.length; skip++) {
      if (matchWords(filter, fi + 1, key, skip)) return true;
    }
    return false;
  }

  if (ki === key.length) return false;
  if (word !== '*' && word !== key[ki]) return false;

  return matchWords(filter, fi + 1, key, ki + 1);
}

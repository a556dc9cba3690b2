/**
 * MQTT topic names and filters.
 *
 * Filters use `+` for one level and a trailing `#` for any remaining levels
 * (including none). Filters that start with a wildcard never match topics
 * that start with `$`.
 */

export function isValidTopicName(topic: string): boolean {
  return topic.length > 0 && !topic.includes('+') && !topic.includes('#');
}

export function isValidTopicFilter(filter: string): boolean {
  if (filter.length === 0) return false;
  const levels = filter.split('/');
  return levels.every((level, index) => {
    if (level.includes('#')) return level === '#' && index === levels.length - 1;
    if (level.includes('+')) return level === '+';
    return true;
  });
}

export function matchTopic(filter: string, topic: string): boolean {
  const filterLevels = filter.split('/');
  const topicLevels = topic.split('/');

  if (topic.startsWith('$') && (filterLevels[0] === '+' || filterLevels[0] === '#')) {
    return false;
  }

  for (const [index, level] of filterLevels.entries()) {
    if (level === '#') return true;
    const actual = topicLevels[index];
    if (actual === undefined) return false;
    if (level !== '+' && level !== actual) return false;
  }

  return filterLevels.length === topicLevels.length;
}

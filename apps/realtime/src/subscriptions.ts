/**
 * Subscription Index
 *
 * topic → subscribers, with a reverse index handle → topics so a
 * disconnect costs O(topics of that handle) rather than O(all topics).
 *
 * Invariant: a topic key exists only while it has at least one subscriber.
 * Not safe to share: owned and mutated by the hub's control loop only.
 */

export class SubscriptionIndex<H> {
  private readonly byTopic = new Map<string, Set<H>>();
  private readonly byHandle = new Map<H, Set<string>>();

  /**
   * Add a (handle, topic) pair. True only when the pair is new.
   */
  subscribe(handle: H, topic: string): boolean {
    let subscribers = this.byTopic.get(topic);
    if (subscribers?.has(handle)) return false;

    if (!subscribers) {
      subscribers = new Set();
      this.byTopic.set(topic, subscribers);
    }
    subscribers.add(handle);

    let topics = this.byHandle.get(handle);
    if (!topics) {
      topics = new Set();
      this.byHandle.set(handle, topics);
    }
    topics.add(topic);

    return true;
  }

  /**
   * Remove a (handle, topic) pair. False when it was not present.
   */
  unsubscribe(handle: H, topic: string): boolean {
    const subscribers = this.byTopic.get(topic);
    if (!subscribers?.delete(handle)) return false;
    if (subscribers.size === 0) this.byTopic.delete(topic);

    const topics = this.byHandle.get(handle);
    topics?.delete(topic);
    if (topics?.size === 0) this.byHandle.delete(handle);

    return true;
  }

  /**
   * Remove a handle from every topic it subscribed to.
   *
   * @returns the topics it was removed from
   */
  unregisterAll(handle: H): string[] {
    const topics = this.byHandle.get(handle);
    if (!topics) return [];
    this.byHandle.delete(handle);

    for (const topic of topics) {
      const subscribers = this.byTopic.get(topic);
      subscribers?.delete(handle);
      if (subscribers?.size === 0) this.byTopic.delete(topic);
    }

    return [...topics];
  }

  has(handle: H, topic: string): boolean {
    return this.byTopic.get(topic)?.has(handle) ?? false;
  }

  /**
   * Point-in-time copy of a topic's subscribers
   */
  subscribers(topic: string): H[] {
    const subscribers = this.byTopic.get(topic);
    return subscribers ? [...subscribers] : [];
  }

  topicsOf(handle: H): string[] {
    const topics = this.byHandle.get(handle);
    return topics ? [...topics] : [];
  }

  topics(): string[] {
    return [...this.byTopic.keys()];
  }

  counts(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const [topic, subscribers] of this.byTopic) {
      counts[topic] = subscribers.size;
    }
    return counts;
  }

  get topicCount(): number {
    return this.byTopic.size;
  }

  clear(): void {
    this.byTopic.clear();
    this.byHandle.clear();
  }
}

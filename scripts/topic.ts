/** Topic a dynamic can be filed under. Only the id travels over the wire. */
export class Topic {
  readonly topicId: number;

  constructor(topicId: number) {
    this.topicId = topicId;
  }
}

export type TopicLike = number | Topic;

export function toTopicId(topic: TopicLike): number {
  return typeof topic === "number" ? topic : topic.topicId;
}

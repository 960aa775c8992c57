import PQueue from 'p-queue';

/**
 * キーごとの直列実行キュー
 *
 * 同じキー（銘柄など）のタスクは投入順に 1 つずつ実行し、異なるキーのタスクは互いを待たない。
 * キューが空になったキーは破棄する。
 */
export class KeyedSerialQueue {
  private readonly queues = new Map<string, PQueue>();

  /**
   * キーの排他区間でタスクを実行する。
   * @param key 直列化の単位
   * @param task 実行するタスク
   * @returns タスクの完了（タスクの例外はそのまま伝播する）
   */
  async run(key: string, task: () => Promise<void>): Promise<void> {
    let queue = this.queues.get(key);
    if (!queue) {
      queue = new PQueue({ concurrency: 1 });
      this.queues.set(key, queue);
    }

    try {
      await queue.add(task);
    } finally {
      if (queue.size === 0 && queue.pending === 0 && this.queues.get(key) === queue) {
        this.queues.delete(key);
      }
    }
  }

  /**
   * 実行中または待機中のタスクを持つキーの数。
   */
  get activeKeys(): number {
    return this.queues.size;
  }
}

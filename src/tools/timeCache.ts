import QuickLRU from "quick-lru";

type Entry<ValueType> = {data: ValueType, expiresAt: number};

class TimeCache<KeyType, ValueType> {
  private readonly ttl: number;
  private lru: QuickLRU<KeyType, Entry<ValueType>>;
  constructor(options: QuickLRU.Options<KeyType, Entry<ValueType>> & {ttl: number}) {
    const {ttl, ...lruOptions} = options;
    this.lru = new QuickLRU<KeyType, Entry<ValueType>>(lruOptions);
    this.ttl = ttl;
  }

  get(key: KeyType) {
    let result = this.lru.get(key);
    if (result && result.expiresAt <= Date.now()) {
      this.lru.delete(key);
      result = undefined;
    }
    return result && result.data;
  }

  set(key: KeyType, value: ValueType) {
    this.lru.set(key, {
      data: value,
      expiresAt: Date.now() + this.ttl
    });
    return this;
  }

  clear() {
    this.lru.clear();
  }

  get size() {
    return this.lru.size;
  }
}

export default TimeCache;

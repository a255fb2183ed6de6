/**
 * Simple usage - sorted sets, sorted maps, vectors and produce()
 */

import { defineMap, defineSet, defineVector, max, produce } from '../packages/core/src/index';

console.log('=== Sylvan: Sorted Collections ===\n');

// ===== Define a set type =====
console.log('1️⃣ Define a set type and build sets');
const scores = defineSet({
  name: 'scores',
  compare: (a: number, b: number) => a - b,
  aggregators: { best: max((a: number, b: number) => a - b) },
});
const monday = scores.of(72, 95, 88);
const tuesday = scores.of(88, 72, 95);

console.log('monday:', [...monday]);
console.log('best:', monday.meta.best, 'size:', monday.size);
console.log('same content, any order:', monday.equals(tuesday));

// ===== Set algebra =====
console.log('\n2️⃣ Set algebra');
const wednesday = scores.of(60, 95, 99);
console.log('union:', [...monday.union(wednesday)]);
console.log('intersection:', [...monday.intersection(wednesday)]);
console.log('difference:', [...monday.difference(wednesday)]);
console.log('union with equal set is the same set:', monday.union(tuesday) === monday);

// ===== produce =====
console.log('\n3️⃣ Batched updates with produce');
const curved = produce(monday, (draft) => {
  draft.delete(72);
  draft.add(80);
});
console.log('curved:', [...curved], 'monday unchanged:', [...monday]);
console.log('no-op recipe returns the base:', produce(monday, (draft) => draft.add(95)) === monday);

// ===== Maps =====
console.log('\n4️⃣ Maps with an explicit duplicate policy');
const stock = defineMap<string, number>({
  name: 'stock',
  compare: (a, b) => a.localeCompare(b),
  onDuplicate: (existing, incoming) => existing + incoming,
});
const morning = stock.of(['bolts', 40], ['nuts', 25]);
const delivery = stock.of(['nuts', 75], ['washers', 10]);
const evening = morning.union(delivery);

console.log('evening:', Object.fromEntries(evening));
console.log('nuts:', evening.get('nuts'));
console.log('same items as morning:', evening.keysEqual(morning));

// ===== Vectors =====
console.log('\n5️⃣ Vectors keep insertion order');
const steps = defineVector<string>({ name: 'steps' });
const recipe = steps.of('mix', 'bake', 'serve');
const { head, tail } = recipe.split(1);
const longer = head.concat(steps.of('rest')).concat(tail);
console.log('steps:', longer.toArray());
console.log('rest removed equals the original:', longer.remove(1).equals(recipe));

// ===== Release =====
console.log('\n6️⃣ Release nodes eagerly');
const live = () => stock.collection.stash.liveNodes;
console.log('live map nodes:', live());
for (const map of [morning, delivery, evening]) {
  map.dispose();
}
console.log('after dispose:', live());

import seedrandom from 'seedrandom'

/** Uniform source in [0, 1). Injected wherever a tie has to be broken. */
export type RandomSource = () => number

export function createRandom(seed?: string): RandomSource {
	const rng = seedrandom(seed ?? undefined)
	return () => rng.quick()
}

export function pickUniform<T>(items: readonly T[], random: RandomSource): T {
	if (items.length === 0) throw new RangeError('pickUniform needs at least one item')
	const draw = random()
	if (!Number.isFinite(draw)) throw new RangeError(`Random source returned ${draw}`)
	const index = Math.min(Math.floor(draw * items.length), items.length - 1)
	return items[Math.max(index, 0)]
}

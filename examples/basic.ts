import { GraphNode, findPathTo, search } from '../src'

const MAP = [
  'S...#....',
  '.##.#.##.',
  '.#..#..#.',
  '.#.###.#.',
  '...#...#G'
]

class Tile implements GraphNode<Tile> {
  constructor (readonly grid: Grid, readonly x: number, readonly y: number) {}

  get hash (): string {
    return `${this.x},${this.y}`
  }

  get connectedNodes (): Tile[] {
    const out: Tile[] = []
    for (const [dx, dy] of [[1, 0], [-1, 0], [0, 1], [0, -1]]) {
      const tile = this.grid.at(this.x + dx, this.y + dy)
      if (tile != null) out.push(tile)
    }
    return out
  }

  cost (): number {
    return 1
  }

  estimatedCost (to: Tile): number {
    return Math.abs(this.x - to.x) + Math.abs(this.y - to.y)
  }
}

class Grid {
  private readonly tiles = new Map<string, Tile>()

  constructor (readonly rows: string[]) {}

  at (x: number, y: number): Tile | undefined {
    if (this.rows[y]?.[x] == null || this.rows[y][x] === '#') return undefined
    let tile = this.tiles.get(`${x},${y}`)
    if (tile == null) {
      tile = new Tile(this, x, y)
      this.tiles.set(tile.hash, tile)
    }
    return tile
  }

  find (char: string): Tile {
    for (let y = 0; y < this.rows.length; y++) {
      const x = this.rows[y].indexOf(char)
      const tile = this.at(x, y)
      if (x >= 0 && tile != null) return tile
    }
    throw new Error(`No ${char} on the map`)
  }
}

const grid = new Grid(MAP)
const start = grid.find('S')
const goal = grid.find('G')

const path = findPathTo(start, goal)
console.log(path.map(tile => tile.hash).join(' -> '))

const result = search(start, goal, { debug: true })
console.log(`${result.status}: cost ${result.cost}, ${result.visitedNodes} visited`)

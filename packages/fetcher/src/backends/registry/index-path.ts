/**
 * Index file locations.
 *
 * Registry indexes shard package files by name length:
 * - 1 character: `1/<name>`
 * - 2 characters: `2/<name>`
 * - 3 characters: `3/<first char>/<name>`
 * - longer: `<chars 1-2>/<chars 3-4>/<name>`
 */

/** Directory part of the index path, in the name's own case */
export function indexPrefix(name: string): string {
  switch (name.length) {
    case 0:
      return ''
    case 1:
      return '1'
    case 2:
      return '2'
    case 3:
      return `3/${name.slice(0, 1)}`
    default:
      return `${name.slice(0, 2)}/${name.slice(2, 4)}`
  }
}

/** Index file path for a package, relative to the index root */
export function indexPath(name: string): string {
  const lower = name.toLowerCase()
  return `${indexPrefix(lower)}/${lower}`
}

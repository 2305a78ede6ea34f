import users from '../data/users.json'

export type User = {
  id: number
  name: string
  email: string
}

export interface UsersApi {
  fetchUsers(query: string): Promise<User[]>
}

export type UsersApiOptions = {
  users?: readonly User[]
  latencyMs?: number
  shouldFail?: () => boolean
}

export const SAMPLE_USERS: readonly User[] = users

export function filterUsers(list: readonly User[], query: string): User[] {
  const needle = query.trim().toLowerCase()
  if (!needle) return [...list]
  return list.filter((u) => u.name.toLowerCase().includes(needle) || u.email.toLowerCase().includes(needle))
}

export function createUsersApi({ users: list = SAMPLE_USERS, latencyMs = 600, shouldFail }: UsersApiOptions = {}): UsersApi {
  return {
    fetchUsers(query) {
      return new Promise<User[]>((resolve, reject) => {
        setTimeout(() => {
          if (shouldFail?.()) {
            reject(new Error('User service unavailable'))
            return
          }
          resolve(filterUsers(list, query))
        }, latencyMs)
      })
    },
  }
}

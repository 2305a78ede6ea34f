import type { Guide } from './types'

export const acidGuide: Guide = {
  id: 'guide-acid',
  title: 'ACID Transactions',
  subtitle: 'What a database promises when it says COMMIT',
  color: 'yellow',
  icon: '🧪',
  sections: [
    {
      id: 'properties',
      title: 'The Four Properties',
      content: [
        {
          type: 'concept-card',
          term: 'Atomicity',
          explanation: 'All of a transaction happens or none of it does.',
          example: 'Debit and credit in a transfer',
        },
        {
          type: 'concept-card',
          term: 'Consistency',
          explanation: 'Constraints hold before and after every committed transaction.',
        },
        {
          type: 'concept-card',
          term: 'Isolation',
          explanation: 'Concurrent transactions do not see each other\'s uncommitted work, to the degree the isolation level promises.',
        },
        {
          type: 'concept-card',
          term: 'Durability',
          explanation: 'Once committed, the change survives a crash.',
        },
        {
          type: 'code',
          language: 'sql',
          code: `BEGIN;
UPDATE accounts SET balance = balance - 100 WHERE id = 1;
UPDATE accounts SET balance = balance + 100 WHERE id = 2;
COMMIT;  -- or ROLLBACK if either update failed`,
        },
      ],
    },
    {
      id: 'isolation',
      title: 'Isolation Levels',
      content: [
        {
          type: 'comparison',
          leftLabel: 'Prevents',
          rightLabel: 'Still allows',
          rows: [
            { label: 'Read Uncommitted', left: 'Nothing', right: 'Dirty, non-repeatable and phantom reads' },
            { label: 'Read Committed', left: 'Dirty reads', right: 'Non-repeatable and phantom reads' },
            { label: 'Repeatable Read', left: 'Dirty and non-repeatable reads', right: 'Phantom reads' },
            { label: 'Serializable', left: 'All three', right: 'Nothing' },
          ],
        },
        {
          type: 'callout',
          tone: 'info',
          body: 'A saga in the distributed-systems sense is the alternative when one ACID transaction cannot span several services: a sequence of local transactions, each with a compensating action that undoes it.',
        },
        {
          type: 'quiz',
          question: 'A transfer debits one account, then the server crashes before the credit. After restart, what does atomicity guarantee?',
          options: ['The debit is kept', 'The debit is rolled back', 'The credit is applied automatically'],
          correctIndex: 1,
          explanation: 'The transaction never committed, so recovery undoes its partial work.',
        },
      ],
    },
  ],
  connections: [
    { concept: 'Compensating actions', file: 'src/saga/sagas.ts', description: 'A failed request is answered with a failure action that restores a consistent state' },
  ],
}

import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

/**
 * One served prediction. Rows are only ever inserted.
 * Every column is TEXT so the stored values read back exactly as written.
 */
@Entity('predictions')
export class PredictionEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  // ISO-8601, set when the request was received
  @Column({ type: 'text' })
  timestamp!: string;

  // JSON of the request payload that was scored
  @Column({ type: 'text' })
  inputs!: string;

  @Column({ type: 'text' })
  prediction!: string;
}

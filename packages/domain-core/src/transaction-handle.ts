/**
 * Transaction capability consumed by the recorder.
 *
 * The persistence layer implements it; domain code only needs to know whether a
 * transaction is open and how to defer work until it commits.
 */

export type CommitCallback = () => void | Promise<void>;

export interface TransactionHandle {
	/** True while the transaction (or an enclosing one) can still commit */
	isOpen(): boolean;
	/**
	 * Run `callback` after the outermost transaction commits.
	 * Dropped without being called if the transaction rolls back.
	 */
	onCommit(callback: CommitCallback): void;
}

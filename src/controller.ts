import { DisplayData } from "./types";
import { Display } from "./display";

/** The part of the collector the controller needs. */
export interface DisplayDataProvider {
	getDisplayData(): Promise<DisplayData>;
}

/**
 * Updates and shows the data in a fixed interval until `exit()` is called. All requests (update and show,
 * sleep, exit) run one after the other, so a cycle in progress is never interleaved with another request.
 */
export class Controller {
	private readonly provider: DisplayDataProvider;
	private readonly display: Display;
	private readonly refreshMs: number;

	private queue: Promise<void> = Promise.resolve();
	private timer: NodeJS.Timeout | undefined;
	private stopRun: ( () => void ) | undefined;
	private lastData: DisplayData | undefined;
	private exited = false;
	private sleeping = false;

	/**
	 * @param refreshMinutes Interval between two updates.
	 */
	public constructor( provider: DisplayDataProvider, display: Display, refreshMinutes = 10 ) {
		this.provider = provider;
		this.display = display;
		this.refreshMs = refreshMinutes * 60 * 1000;
	}

	/** The last record shown, undefined before the first update finished. */
	public get latest(): DisplayData | undefined {
		return this.lastData;
	}

	public get isExited(): boolean {
		return this.exited;
	}

	public get isSleeping(): boolean {
		return this.sleeping;
	}

	public updateAndShow(): Promise<void> {
		return this.enqueue( () => this.show() );
	}

	/** Pause the periodic updates until the next `updateAndShow()`. */
	public activateSleep(): Promise<void> {
		return this.enqueue( () => {
			this.sleeping = true;
		} );
	}

	public exit(): Promise<void> {
		return this.enqueue( () => {
			this.exited = true;
			clearTimeout( this.timer );
			this.timer = undefined;
			this.stopRun?.();
		} );
	}

	/**
	 * Show the data once, then every refresh interval. Resolves after `exit()`.
	 */
	public run(): Promise<void> {
		return new Promise<void>( resolve => {
			this.stopRun = resolve;
			if ( this.exited ) {
				resolve();
				return;
			}
			void this.updateAndShow().then( () => this.schedule() );
		} );
	}

	private schedule(): void {
		if ( this.exited ) {
			return;
		}
		this.timer = setTimeout( () => {
			void this.enqueue( async () => {
				if ( !this.exited && !this.sleeping ) {
					await this.show();
				}
			} ).then( () => this.schedule() );
		}, this.refreshMs );
	}

	private async show(): Promise<void> {
		const data = await this.provider.getDisplayData();
		this.sleeping = false;
		this.lastData = data;
		this.display.show( data );
	}

	/** Queue a task behind the running one. A failing task is logged and does not stop the queue. */
	private enqueue( task: () => Promise<void> | void ): Promise<void> {
		const next = this.queue.then( task ).catch( ( err: unknown ) => {
			console.error( "[Controller] Update failed:", err );
		} );
		this.queue = next;
		return next;
	}
}

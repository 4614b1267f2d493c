//
//
//

export interface Display {
    /**
     * Shows a fully rendered frame, replacing the previous one if the
     * display supports it.
     */
    write(frame: string): void;
}

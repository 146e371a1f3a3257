/**
 * User feedback toasts, wrapping react-hot-toast.
 */
import { toast as hotToast } from 'react-hot-toast';

const DURATION = 3000;
const ariaProps = {
    role: 'status' as const,
    'aria-live': 'polite' as const,
};

const toast = {
    info: (message: string) =>
        hotToast(message, {
            duration: DURATION,
            icon: 'i',
            ariaProps,
        }),
};

export default toast;
